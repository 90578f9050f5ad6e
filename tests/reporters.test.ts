import chalk from 'chalk';

import * as jsonReporter from '../src/reporters/json';
import * as textReporter from '../src/reporters/text';
import { BlockedInfo } from '../src/types';

describe('Reporters', () => {
  const blocked: BlockedInfo = {
    package: 'keras',
    status: 'blocked',
    blockedVersionCount: 2,
    blockedVersionsList: ['3.11.2', '3.11.3'],
    reasons: ['Version 3.11.2: CVE-2025-12060'],
  };
  const auditUrl = 'http://127.0.0.1:8000/blocked/keras';

  beforeAll(() => {
    chalk.level = 0;
  });

  describe('JSON Reporter', () => {
    it('should output the blocked info with its audit URL', () => {
      const parsed = JSON.parse(jsonReporter.report(blocked, auditUrl));
      expect(parsed).toEqual({ ...blocked, auditUrl });
    });
  });

  describe('Text Reporter', () => {
    it('should render the blocked panel', () => {
      const output = textReporter.renderBlockedPanel({
        package: 'keras',
        version: '3.11.2',
        reason: 'Version 3.11.2: CVE-2025-12060',
        auditUrl,
      });
      expect(output).toContain('Installation Blocked');
      expect(output).toContain('Package: keras');
      expect(output).toContain('Version: 3.11.2');
      expect(output).toContain('Reason: Version 3.11.2: CVE-2025-12060');
      expect(output).toContain(`curl ${auditUrl}`);
    });

    it('should show "any" when no version is given', () => {
      const output = textReporter.renderBlockedPanel({ package: 'keras', reason: 'x', auditUrl });
      expect(output).toContain('Version: any');
    });

    it('should list blocked versions for an audit', () => {
      const output = textReporter.renderBlockedInfo(blocked, auditUrl);
      expect(output).toContain('Version: 2 version(s)');
      expect(output).toContain('Blocked versions: 3.11.2, 3.11.3');
    });

    it('should report an allowed package', () => {
      const output = textReporter.renderBlockedInfo(
        { ...blocked, status: 'allowed', blockedVersionCount: 0, blockedVersionsList: [], reasons: [] },
        auditUrl,
      );
      expect(output).toContain("✅ Package 'keras' is allowed");
    });

    it('should report lookup errors', () => {
      const output = textReporter.renderBlockedInfo(
        { ...blocked, status: 'error', error: 'Cannot connect to firewall at http://127.0.0.1:8000' },
        auditUrl,
      );
      expect(output).toBe('❌ Error checking package: Cannot connect to firewall at http://127.0.0.1:8000\n');
    });

    it('should tabulate packages blocked during install', () => {
      const output = textReporter.renderMonitorReport({
        packages: [
          { name: 'numpy', version: '2.3.5' },
          { name: 'keras', version: '3.11.2' },
        ],
        count: 2,
      });
      expect(output).toContain('❌ Firewall blocked 2 package(s)');
      expect(output).toContain('numpy');
      expect(output).toContain('3.11.2');
      expect(output).toContain('For details, run: pip-warden audit numpy==2.3.5');
    });

    it('should title the banner with the version', () => {
      expect(textReporter.renderBanner('0.1.0')).toContain('v0.1.0');
    });
  });
});

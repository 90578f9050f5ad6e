import { BlockedInfo, FailureKind, ValidationDetails, ValidationResult } from '../types';
import { BlockedInfoResolver, WILDCARD_VERSION } from './blocked-info';
import { FirewallClient } from './client';

export const PASSED_REASON = 'passed validation';
export const NOT_FOUND_REASON = 'package not found';
export const POLICY_BLOCK_REASON = 'Package is blocked by firewall policy';

/**
 * Asks the firewall whether a package (and optionally an exact version) may be
 * installed. Fail-closed: anything other than a positive answer is a block.
 */
export class FirewallValidator {
  private readonly resolver: BlockedInfoResolver;

  constructor(
    private readonly client: FirewallClient,
    resolver?: BlockedInfoResolver,
  ) {
    this.resolver = resolver ?? new BlockedInfoResolver(client);
  }

  async validate(name: string, version?: string): Promise<ValidationResult> {
    const pkg = name.toLowerCase();
    try {
      return await this.classify(pkg, version);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      return this.block(pkg, `Validation error: ${msg}`, { error: 'internal' });
    }
  }

  private async classify(pkg: string, version?: string): Promise<ValidationResult> {
    const outcome = await this.client.get(`/simple/${encodeURIComponent(pkg)}/`);

    switch (outcome.kind) {
      case 'connection-error':
        return this.block(pkg, `Cannot connect to firewall at ${this.client.baseUrl}`, {
          error: 'connection_error',
        });
      case 'timeout':
        return this.block(pkg, `Firewall validation timed out after ${outcome.timeoutMs}ms`, {
          error: 'timeout',
        });
      case 'failure':
        return this.block(pkg, `Validation error: ${outcome.message}`, { error: 'internal' });
      case 'response':
        break;
    }

    const { status } = outcome;
    if (status === 403) {
      const info = await this.resolver.getBlockedInfo(pkg);
      const reason =
        info.reasons.filter((r) => r.trim().length > 0).join('; ') || POLICY_BLOCK_REASON;
      return this.block(pkg, reason, { error: 'blocked', statusCode: status, blockedInfo: info });
    }
    if (status === 404) {
      return this.block(pkg, NOT_FOUND_REASON, { error: 'not_found', statusCode: status });
    }
    if (status !== 200) {
      return this.block(pkg, `Unexpected response from firewall: ${status}`, {
        error: 'unexpected_status',
        statusCode: status,
      });
    }

    if (!version) return this.allow(pkg);
    return this.checkVersion(pkg, version);
  }

  private async checkVersion(pkg: string, version: string): Promise<ValidationResult> {
    const info = await this.resolver.getBlockedInfo(pkg);

    if (info.status === 'allowed') return this.allow(pkg, info);
    if (info.status !== 'blocked') {
      return this.block(pkg, `Could not verify version ${version}: ${info.error ?? info.status}`, {
        error: unverifiedKind(info),
        blockedInfo: info,
      });
    }

    const listed = info.blockedVersionsList;
    if (!listed.includes(version) && !listed.includes(WILDCARD_VERSION)) {
      return this.allow(pkg, info);
    }

    const reason = info.reasons.find((r) => r.includes(version)) ?? `Version ${version} is blocked`;
    return this.block(pkg, reason, { error: 'blocked', blockedInfo: info });
  }

  private allow(pkg: string, blockedInfo?: BlockedInfo): ValidationResult {
    const details: ValidationDetails = { package: pkg, auditUrl: this.client.auditUrl(pkg) };
    if (blockedInfo) details.blockedInfo = blockedInfo;
    return { status: 'allow', reason: PASSED_REASON, details };
  }

  private block(
    pkg: string,
    reason: string,
    extra: Omit<ValidationDetails, 'package' | 'auditUrl'>,
  ): ValidationResult {
    return {
      status: 'block',
      reason,
      details: { package: pkg, auditUrl: this.client.auditUrl(pkg), ...extra },
    };
  }
}

function unverifiedKind(info: BlockedInfo): FailureKind {
  return info.error?.startsWith('Malformed') ? 'malformed_response' : 'unverified';
}

import {
  InstallOutputMonitor,
  extractBlockedPackage,
  isBlockSignal,
} from '../src/monitor/output-monitor';
import { OrderedRecordSet } from '../src/monitor/record-set';

const NUMPY_403 =
  'ERROR: HTTP error 403 while getting http://host/pypi/packages/numpy-2.3.5-cp313-cp313-win_amd64.whl.metadata';

async function* linesOf(...lines: string[]): AsyncGenerator<string> {
  for (const line of lines) yield line;
}

describe('Block signal detection', () => {
  test('recognises both 403 markers', () => {
    expect(isBlockSignal(NUMPY_403)).toBe(true);
    expect(isBlockSignal('403 Client Error: Forbidden for url: http://host/simple/x/')).toBe(true);
    expect(isBlockSignal('Collecting numpy')).toBe(false);
  });

  test('extracts name and version from a package URL', () => {
    expect(extractBlockedPackage(NUMPY_403)).toEqual({ name: 'numpy', version: '2.3.5' });
  });

  test('splits hyphenated names at the version', () => {
    const line =
      '403 Client Error: Forbidden for url: http://host/packages/Scikit-Learn-1.5.0-cp312-cp312-manylinux.whl';
    expect(extractBlockedPackage(line)).toEqual({ name: 'scikit-learn', version: '1.5.0' });
  });

  test('keeps trailing build tags on the version', () => {
    const line = 'ERROR: HTTP error 403 while getting http://host/packages/torch-2.1.0rc1-cp311-none.whl';
    expect(extractBlockedPackage(line)).toEqual({ name: 'torch', version: '2.1.0rc1' });
  });

  test('returns null without a package URL', () => {
    expect(extractBlockedPackage('ERROR: HTTP error 403 while getting http://host/simple/numpy/')).toBeNull();
  });
});

describe('OrderedRecordSet', () => {
  test('keeps first-seen order and drops exact duplicates', () => {
    const set = new OrderedRecordSet();

    expect(set.add({ name: 'numpy', version: '2.3.5' })).toBe(true);
    expect(set.add({ name: 'keras', version: '3.11.2' })).toBe(true);
    expect(set.add({ name: 'numpy', version: '2.3.5' })).toBe(false);
    expect(set.add({ name: 'numpy', version: '2.3.4' })).toBe(true);

    expect(set.size).toBe(3);
    expect(set.has({ name: 'keras', version: '3.11.2' })).toBe(true);
    expect(set.values()).toEqual([
      { name: 'numpy', version: '2.3.5' },
      { name: 'keras', version: '3.11.2' },
      { name: 'numpy', version: '2.3.4' },
    ]);
  });
});

describe('InstallOutputMonitor', () => {
  test('forwards every line unchanged', async () => {
    const forwarded: string[] = [];
    const monitor = new InstallOutputMonitor((line) => forwarded.push(line));

    await monitor.consume(linesOf('Collecting numpy', NUMPY_403, '  Downloading metadata'));

    expect(forwarded).toEqual(['Collecting numpy', NUMPY_403, '  Downloading metadata']);
  });

  test('records a blocked package once even when the line repeats', () => {
    const monitor = new InstallOutputMonitor(() => undefined);

    monitor.observe(NUMPY_403);
    monitor.observe(NUMPY_403);

    expect(monitor.blockedPackages).toEqual([{ name: 'numpy', version: '2.3.5' }]);
    expect(monitor.signalCount).toBe(2);
  });

  test('ignores package URLs on lines without a block signal', () => {
    const monitor = new InstallOutputMonitor(() => undefined);

    monitor.observe('Downloading http://host/packages/numpy-2.3.5-cp313-cp313-win_amd64.whl');

    expect(monitor.signalCount).toBe(0);
    expect(monitor.blockedPackages).toEqual([]);
  });

  test('counts a signal it cannot attribute to a package', () => {
    const monitor = new InstallOutputMonitor(() => undefined);

    monitor.observe('ERROR: HTTP error 403 while getting http://host/simple/numpy/');

    expect(monitor.signalCount).toBe(1);
    expect(monitor.finalize(1)).toBeNull();
  });

  test('reports blocked packages only when the install failed', () => {
    const monitor = new InstallOutputMonitor(() => undefined);
    monitor.observe(NUMPY_403);

    expect(monitor.finalize(0)).toBeNull();
    expect(monitor.finalize(1)).toEqual({
      packages: [{ name: 'numpy', version: '2.3.5' }],
      count: 1,
    });
  });
});

import { BlockedPackageRecord, BlockedPackageReport } from '../types';
import { OrderedRecordSet } from './record-set';

export const BLOCK_SIGNALS = ['HTTP error 403', '403 Client Error: Forbidden'];

// e.g. .../packages/numpy-2.3.5-cp313-cp313-win_amd64.whl.metadata
// Heuristic: the name ends at the last '-' followed by a digit-led version.
const PACKAGE_URL_PATTERN = /\/packages\/([a-zA-Z0-9_-]+)-([\d.]+[a-zA-Z0-9.]*)/;

export function isBlockSignal(line: string): boolean {
  return BLOCK_SIGNALS.some((signal) => line.includes(signal));
}

export function extractBlockedPackage(line: string): BlockedPackageRecord | null {
  const match = PACKAGE_URL_PATTERN.exec(line);
  if (!match) return null;
  return { name: match[1].toLowerCase(), version: match[2] };
}

export type LineSink = (line: string) => void;

const writeToStdout: LineSink = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Watches pip's merged output while it runs. Every line is forwarded to the
 * sink as soon as it is read; lines carrying a 403 are mined for the package
 * that the firewall refused.
 */
export class InstallOutputMonitor {
  private readonly blocked = new OrderedRecordSet();
  private signals = 0;

  constructor(private readonly sink: LineSink = writeToStdout) {}

  observe(line: string): void {
    this.sink(line);
    if (!isBlockSignal(line)) return;

    this.signals++;
    const record = extractBlockedPackage(line);
    if (record) this.blocked.add(record);
  }

  async consume(lines: AsyncIterable<string>): Promise<void> {
    for await (const line of lines) {
      this.observe(line);
    }
  }

  get signalCount(): number {
    return this.signals;
  }

  get blockedPackages(): BlockedPackageRecord[] {
    return this.blocked.values();
  }

  /** Only a failed install with at least one identified package produces a report. */
  finalize(exitCode: number): BlockedPackageReport | null {
    if (this.blocked.size === 0 || exitCode === 0) return null;
    const packages = this.blocked.values();
    return { packages, count: packages.length };
  }
}

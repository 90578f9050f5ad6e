import { PipWardenConfig } from './config';
import { ConnectivityProbe } from './firewall/connectivity';
import { FirewallClient } from './firewall/client';
import { BlockedInfoResolver } from './firewall/blocked-info';
import { FirewallValidator } from './firewall/validator';
import { InstallOutputMonitor, LineSink } from './monitor/output-monitor';
import pipHandler, { spawnInstall } from './package-managers/pip';
import {
  BlockedInfo,
  BlockedPackageReport,
  InstallOptions,
  PackageReference,
  ValidationResult,
} from './types';
import { parsePackageSpec } from './utils/package-spec';
import { DebugLogger, silentDebug } from './utils/logger';

export * from './types';
export * from './firewall';
export { InstallOutputMonitor, extractBlockedPackage, isBlockSignal } from './monitor/output-monitor';
export type { LineSink } from './monitor/output-monitor';
export { OrderedRecordSet } from './monitor/record-set';
export { parsePackageSpec } from './utils/package-spec';
export { loadRequirements, parseRequirements } from './utils/requirements';
export { loadConfig, defaultConfig, FIREWALL_URL_ENV } from './config';
export type { PipWardenConfig } from './config';

/**
 * Opens one firewall client for the duration of `fn` and always closes it,
 * whether `fn` resolves, rejects or stops early on a block.
 */
export async function withFirewall<T>(
  config: Pick<PipWardenConfig, 'firewallUrl' | 'timeoutMs'>,
  fn: (client: FirewallClient) => Promise<T>,
  debug: DebugLogger = silentDebug,
): Promise<T> {
  const client = new FirewallClient({
    baseUrl: config.firewallUrl,
    timeoutMs: config.timeoutMs,
    debug,
  });
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

export interface ValidationObserver {
  start?(ref: PackageReference): void;
  finish?(ref: PackageReference, result: ValidationResult): void;
}

export type ValidationVerdict =
  | { passed: true; results: ValidationResult[] }
  | { passed: false; results: ValidationResult[]; ref: PackageReference; result: ValidationResult };

/**
 * Validates one package at a time, in order, and stops at the first block so
 * the caller can name the exact package responsible.
 */
export async function validatePackages(
  refs: PackageReference[],
  validator: FirewallValidator,
  observer: ValidationObserver = {},
): Promise<ValidationVerdict> {
  const results: ValidationResult[] = [];
  for (const ref of refs) {
    observer.start?.(ref);
    const result = await validator.validate(ref.name, ref.version);
    observer.finish?.(ref, result);
    results.push(result);
    if (result.status === 'block') {
      return { passed: false, results, ref, result };
    }
  }
  return { passed: true, results };
}

export interface InstallRun {
  exitCode: number;
  report: BlockedPackageReport | null;
}

export async function runInstall(
  command: string[],
  args: string[],
  monitor: InstallOutputMonitor,
  debug: DebugLogger = silentDebug,
): Promise<InstallRun> {
  debug(`Spawning: ${[...command, ...args].join(' ')}`);
  let exitCode: number;
  try {
    const proc = spawnInstall(command, args);
    [, exitCode] = await Promise.all([monitor.consume(proc.lines), proc.exit]);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to execute ${command[0] ?? 'package manager'}: ${msg}`);
  }
  debug(`Package manager exited with code ${exitCode}`);
  return { exitCode, report: monitor.finalize(exitCode) };
}

export interface InstallRequest {
  specifiers: string[];
  options: InstallOptions;
  config: PipWardenConfig;
  force?: boolean;
  observer?: ValidationObserver;
  sink?: LineSink;
  /** Called after validation passes (or is skipped), right before pip starts. */
  beforeInstall?: (refs: PackageReference[]) => void;
  debug?: DebugLogger;
}

export type InstallOutcome =
  | { kind: 'blocked'; ref: PackageReference; result: ValidationResult }
  | ({ kind: 'installed' } & InstallRun);

export async function installPackages(request: InstallRequest): Promise<InstallOutcome> {
  const debug = request.debug ?? silentDebug;
  const refs = request.specifiers.map(parsePackageSpec);
  if (refs.length === 0) {
    throw new Error('No packages to install');
  }

  if (!request.force) {
    const verdict = await withFirewall(
      request.config,
      (client) => validatePackages(refs, new FirewallValidator(client), request.observer),
      debug,
    );
    if (!verdict.passed) {
      return { kind: 'blocked', ref: verdict.ref, result: verdict.result };
    }
  }

  request.beforeInstall?.(refs);
  const args = pipHandler.buildInstallArgs(refs, request.options);
  const run = await runInstall(
    request.config.pipCommand,
    args,
    new InstallOutputMonitor(request.sink),
    debug,
  );
  return { kind: 'installed', ...run };
}

export interface AuditResult {
  info: BlockedInfo;
  auditUrl: string;
}

export async function auditPackage(
  specifier: string,
  config: PipWardenConfig,
  debug: DebugLogger = silentDebug,
): Promise<AuditResult> {
  const { name } = parsePackageSpec(specifier);
  return withFirewall(
    config,
    async (client) => {
      const info = await new BlockedInfoResolver(client).getBlockedInfo(name);
      return { info, auditUrl: client.auditUrl(info.package) };
    },
    debug,
  );
}

export async function checkFirewall(
  config: PipWardenConfig,
  debug: DebugLogger = silentDebug,
): Promise<boolean> {
  return withFirewall(
    config,
    (client) => new ConnectivityProbe(client, config.connectivityTimeoutMs).checkConnectivity(),
    debug,
  );
}

import { spawn } from 'child_process';
import * as readline from 'readline';
import { PassThrough } from 'stream';

import { InstallOptions, PackageManagerHandler, PackageReference } from '../types';

function buildInstallArgs(packages: PackageReference[], options: InstallOptions): string[] {
  const args = ['install'];

  if (options.requirement) {
    args.push('-r', options.requirement);
  } else {
    args.push(...packages.map((p) => p.specifier));
  }

  if (options.upgrade) args.push('--upgrade');
  if (options.indexUrl) args.push('--index-url', options.indexUrl);
  if (options.extraIndexUrl) args.push('--extra-index-url', options.extraIndexUrl);
  if (options.trustedHost) args.push('--trusted-host', options.trustedHost);
  if (options.noDeps) args.push('--no-deps');

  return args;
}

export interface InstallProcess {
  /** stdout and stderr interleaved, one entry per line, in arrival order. */
  lines: AsyncIterable<string>;
  /** Resolves with the exit code; a process killed by a signal counts as 1. */
  exit: Promise<number>;
}

/**
 * Starts `command` with `args` appended. Both output pipes feed one line
 * reader so block signals are seen whichever stream pip writes them to.
 */
export function spawnInstall(command: string[], args: string[]): InstallProcess {
  const [bin, ...prefix] = command;
  if (!bin) {
    throw new Error('Package manager command is empty');
  }

  const child = spawn(bin, [...prefix, ...args], {
    stdio: ['inherit', 'pipe', 'pipe'],
    env: { ...process.env, PYTHONUNBUFFERED: '1' },
  });

  const merged = new PassThrough();
  let open = 2;
  const release = () => {
    open--;
    if (open === 0) merged.end();
  };
  for (const stream of [child.stdout, child.stderr]) {
    stream.pipe(merged, { end: false });
    stream.on('close', release);
  }

  const exit = new Promise<number>((resolve, reject) => {
    child.on('error', reject);
    child.on('close', (code) => resolve(code ?? 1));
  });

  return { lines: readline.createInterface({ input: merged, crlfDelay: Infinity }), exit };
}

const pipHandler: PackageManagerHandler = { buildInstallArgs };

export default pipHandler;

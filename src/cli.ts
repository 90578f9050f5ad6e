import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';

import pkg from '../package.json';
import { loadConfig, PipWardenConfig } from './config';
import { auditPackage, checkFirewall, installPackages, ValidationObserver } from './index';
import * as jsonReporter from './reporters/json';
import {
  renderBanner,
  renderBlockedInfo,
  renderBlockedPanel,
  renderMonitorReport,
} from './reporters/text';
import { createDebugLogger } from './utils/logger';
import { loadRequirements } from './utils/requirements';

export const version: string = pkg.version;

export interface CliContext {
  exit: (code: number) => void;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

interface InstallCliOptions {
  force?: boolean;
  upgrade?: boolean;
  requirement?: string;
  indexUrl?: string;
  extraIndexUrl?: string;
  trustedHost?: string;
  deps: boolean;
  debug?: boolean;
}

interface AuditCliOptions {
  format: string;
  debug?: boolean;
}

interface CheckCliOptions {
  url?: string;
  debug?: boolean;
}

function showError(message: string) {
  console.error(chalk.red(`❌ ${message}`));
}

function spinnerObserver(): ValidationObserver {
  let spinner: ReturnType<typeof ora> | null = null;
  return {
    start(ref) {
      spinner = ora(
        `🔍 Validating ${chalk.cyan(ref.specifier)} against security policies...`,
      ).start();
    },
    finish(ref, result) {
      spinner?.stop();
      spinner = null;
      if (result.status === 'allow') {
        console.log(chalk.green(`✅ Security checks passed for ${ref.specifier}`));
      }
    },
  };
}

export function buildProgram(
  ctx: CliContext = { exit: (code: number) => process.exit(code) },
): Command {
  const program = new Command();
  const config = (): PipWardenConfig => loadConfig(ctx.cwd, ctx.env);

  program
    .name('pip-warden')
    .description('🛡️  Secure pip wrapper with firewall validation')
    .version(version);

  program
    .command('install')
    .description('Install packages with security validation')
    .argument('[packages...]', 'Package(s) to install')
    .option('-f, --force', 'Skip security validation (use with caution)')
    .option('-U, --upgrade', 'Upgrade package to the newest available version')
    .option('-r, --requirement <file>', 'Install from the given requirements file')
    .option('-i, --index-url <url>', 'Base URL of the Python Package Index')
    .option('--extra-index-url <url>', 'Extra URLs of package indexes to use')
    .option('--trusted-host <host>', 'Mark this host as trusted')
    .option('--no-deps', "Don't install package dependencies")
    .option('--debug', 'Enable debug logging')
    .action(async (packages: string[], options: InstallCliOptions) => {
      try {
        let specifiers: string[];
        if (options.requirement) {
          specifiers = loadRequirements(options.requirement);
        } else if (packages.length > 0) {
          specifiers = packages;
        } else {
          showError(
            "No packages specified. Use 'pip-warden install <package>' or '-r requirements.txt'",
          );
          ctx.exit(1);
          return;
        }

        if (specifiers.length === 0) {
          showError('No packages to install');
          ctx.exit(1);
          return;
        }

        console.log(renderBanner(version));
        if (options.force) {
          console.warn(chalk.yellow('⚠️  Skipping security validation (--force flag used)'));
        }

        const outcome = await installPackages({
          specifiers,
          force: options.force,
          config: config(),
          options: {
            upgrade: options.upgrade,
            requirement: options.requirement,
            indexUrl: options.indexUrl,
            extraIndexUrl: options.extraIndexUrl,
            trustedHost: options.trustedHost,
            noDeps: !options.deps,
          },
          observer: spinnerObserver(),
          beforeInstall: (refs) => {
            console.log(
              chalk.bold(`📦 Installing ${refs.map((r) => r.specifier).join(', ')}...`),
            );
          },
          debug: createDebugLogger(options.debug),
        });

        if (outcome.kind === 'blocked') {
          console.log(
            renderBlockedPanel({
              package: outcome.result.details.package,
              version: outcome.ref.version ?? 'latest',
              reason: outcome.result.reason,
              auditUrl: outcome.result.details.auditUrl,
            }),
          );
          showError('Installation aborted due to security policy violations');
          ctx.exit(1);
          return;
        }

        if (outcome.report) {
          console.log(renderMonitorReport(outcome.report));
        }
        ctx.exit(outcome.exitCode);
      } catch (error: unknown) {
        showError(error instanceof Error ? error.message : String(error));
        ctx.exit(1);
      }
    });

  program
    .command('audit')
    .description('Check if a package is blocked and why')
    .argument('<package>', 'Package name to audit')
    .option('--format <format>', 'Output format (text, json)', 'text')
    .option('--debug', 'Enable debug logging')
    .action(async (specifier: string, options: AuditCliOptions) => {
      const spinner =
        options.format === 'text'
          ? ora(`🔍 Checking ${chalk.cyan(specifier)} against the firewall...`).start()
          : null;
      try {
        const { info, auditUrl } = await auditPackage(
          specifier,
          config(),
          createDebugLogger(options.debug),
        );
        spinner?.stop();

        if (options.format === 'json') {
          console.log(jsonReporter.report(info, auditUrl));
        } else {
          console.log(renderBlockedInfo(info, auditUrl));
        }
        ctx.exit(info.status === 'error' ? 1 : 0);
      } catch (error: unknown) {
        spinner?.stop();
        showError(error instanceof Error ? error.message : String(error));
        ctx.exit(1);
      }
    });

  program
    .command('check')
    .description('Check if the firewall is reachable')
    .option('--url <url>', 'Firewall API URL (defaults to PIP_WARDEN_FIREWALL_URL or the config file)')
    .option('--debug', 'Enable debug logging')
    .action(async (options: CheckCliOptions) => {
      const spinner = ora('🔍 Checking firewall connectivity...');
      try {
        const resolved = config();
        if (options.url) resolved.firewallUrl = options.url;

        spinner.start();
        const reachable = await checkFirewall(resolved, createDebugLogger(options.debug));
        spinner.stop();

        if (reachable) {
          console.log(chalk.green(`✅ Firewall is reachable at ${resolved.firewallUrl}`));
          ctx.exit(0);
        } else {
          console.log(chalk.red(`❌ Firewall is not reachable at ${resolved.firewallUrl}`));
          console.log(chalk.dim('Make sure the package firewall service is running'));
          ctx.exit(1);
        }
      } catch (error: unknown) {
        spinner.stop();
        showError(error instanceof Error ? error.message : String(error));
        ctx.exit(1);
      }
    });

  return program;
}

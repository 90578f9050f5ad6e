import boxen from 'boxen';
import chalk from 'chalk';
import Table from 'cli-table3';
import gradient from 'gradient-string';

import { BlockedInfo, BlockedPackageReport } from '../types';

const wardenGradient = gradient(['#1D976C', '#3CB371', '#93F9B9']);

export function renderBanner(version: string): string {
  return boxen(wardenGradient('PIP WARDEN\nFirewall-checked pip installs'), {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'green',
    title: 'v' + version,
    titleAlignment: 'right',
  });
}

export interface BlockedPanel {
  package: string;
  version?: string;
  reason: string;
  auditUrl: string;
}

export function renderBlockedPanel({ package: pkg, version, reason, auditUrl }: BlockedPanel): string {
  const content = [
    `${chalk.cyan.bold('Package:')} ${pkg}`,
    `${chalk.cyan.bold('Version:')} ${version || 'any'}`,
    '',
    `${chalk.yellow.bold('Reason:')} ${reason}`,
    '',
    `${chalk.bold('For details:')} ${chalk.dim(`curl ${auditUrl}`)}`,
  ].join('\n');

  return (
    '\n' +
    boxen(content, {
      title: chalk.red.bold('🚫 Installation Blocked'),
      borderStyle: 'round',
      borderColor: 'red',
      padding: 1,
    }) +
    '\n'
  );
}

/** Packages pip itself was refused while resolving, e.g. transitive dependencies. */
export function renderMonitorReport(report: BlockedPackageReport): string {
  const table = new Table({
    head: [chalk.bold('Package'), chalk.bold('Version')],
    style: { head: [], border: [] },
  });
  report.packages.forEach(({ name, version }) => {
    table.push([chalk.red.bold(name), chalk.red(version)]);
  });

  const first = report.packages[0];
  let output = '\n' + chalk.red(`❌ Firewall blocked ${report.count} package(s)`) + '\n';
  output += table.toString() + '\n';
  if (first) {
    output +=
      '\n' + chalk.blue(`ℹ️  For details, run: pip-warden audit ${first.name}==${first.version}`) + '\n';
  }
  return output;
}

export function renderBlockedInfo(info: BlockedInfo, auditUrl: string): string {
  switch (info.status) {
    case 'blocked': {
      const reason = info.reasons.length > 0 ? info.reasons.join('; ') : 'No specific reason provided';
      let output = renderBlockedPanel({
        package: info.package,
        version: `${info.blockedVersionCount} version(s)`,
        reason,
        auditUrl,
      });
      if (info.blockedVersionsList.length > 0) {
        output += `\n${chalk.bold('Blocked versions:')} ${info.blockedVersionsList.join(', ')}\n`;
      }
      return output;
    }
    case 'allowed':
      return (
        '\n' +
        chalk.green(`✅ Package '${info.package}' is allowed`) +
        '\n' +
        chalk.dim('No versions are currently blocked by the firewall') +
        '\n'
      );
    case 'error':
      return chalk.red(`❌ Error checking package: ${info.error ?? 'Unknown error'}`) + '\n';
    case 'unknown':
      return (
        chalk.blue(`ℹ️  Package status: unknown${info.error ? ` (${info.error})` : ''}`) + '\n'
      );
  }
}

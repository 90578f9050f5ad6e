import chalk from 'chalk';

export type DebugLogger = (msg: string) => void;

export function createDebugLogger(enabled?: boolean): DebugLogger {
  return (msg: string) => {
    if (enabled) console.log(chalk.dim(`[DEBUG] ${msg}`));
  };
}

export const silentDebug: DebugLogger = () => undefined;

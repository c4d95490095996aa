/**
 * CLI logger - colored log lines on stderr
 */

import chalk from 'chalk';
import { createLogger } from 'perfscope-core';
import type { LogLevel, LogSink, Logger } from 'perfscope-core';

const COLORS: Record<LogLevel, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: text => text,
  debug: chalk.gray,
};

export const colorSink: LogSink = (level, line) => {
  process.stderr.write(`${COLORS[level](line)}\n`);
};

export function createCliLogger(minLevel: LogLevel, verbose = false): Logger {
  return createLogger({ minLevel: verbose ? 'debug' : minLevel, sink: colorSink, scope: 'perfscope' });
}

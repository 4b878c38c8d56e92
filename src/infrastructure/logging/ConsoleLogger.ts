// ============================================================================
// CONSOLE LOGGER - INFRASTRUCTURE LAYER
// ============================================================================

import chalk from 'chalk';
import { ILogger } from '../../core/interfaces';
import { LogLevel } from '../../types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class ConsoleLogger implements ILogger {
  private readonly context: string;
  private level: LogLevel;

  constructor(context: string = 'Advisory', level: LogLevel = process.env.NODE_ENV === 'development' ? 'debug' : 'info') {
    this.context = context;
    this.level = level;
  }

  debug(message: string, meta?: object): void {
    if (!this.isEnabled('debug')) return;

    console.debug(this.formatLine(chalk.gray('[DEBUG]'), message));
    if (meta) {
      console.debug(chalk.gray('  Meta:'), this.formatMeta(meta));
    }
  }

  info(message: string, meta?: object): void {
    if (!this.isEnabled('info')) return;

    console.info(this.formatLine(chalk.green('[INFO]'), message));
    if (meta) {
      console.info(chalk.gray('  Meta:'), this.formatMeta(meta));
    }
  }

  warn(message: string, meta?: object): void {
    if (!this.isEnabled('warn')) return;

    console.warn(this.formatLine(chalk.yellow('[WARN]'), message));
    if (meta) {
      console.warn(chalk.gray('  Meta:'), this.formatMeta(meta));
    }
  }

  error(message: string, error?: Error, meta?: object): void {
    if (!this.isEnabled('error')) return;

    console.error(this.formatLine(chalk.red('[ERROR]'), message));

    if (error) {
      console.error(chalk.red('  Error:'), error.message);

      if (this.level === 'debug' && error.stack) {
        console.error(chalk.red('  Stack:'), error.stack);
      }
    }

    if (meta) {
      console.error(chalk.gray('  Meta:'), this.formatMeta(meta));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(childContext: string): ConsoleLogger {
    return new ConsoleLogger(`${this.context}:${childContext}`, this.level);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  // ===== HELPER METHODS =====

  private isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private formatLine(levelStr: string, message: string): string {
    const timestamp = chalk.gray(new Date().toISOString());
    const contextStr = chalk.blue(`[${this.context}]`);
    return `${timestamp} ${contextStr} ${levelStr} ${message}`;
  }

  private formatMeta(meta: object): string {
    try {
      return JSON.stringify(meta, null, 2);
    } catch {
      return '[Circular or unserializable object]';
    }
  }
}

import { type Logger, pino } from 'pino';
import type { ModuleOptions } from '../domain/types.js';

let silent: Logger | undefined;

/** Shared logger used when no logger is configured. */
export function silentLogger(): Logger {
  silent ??= pino({ level: 'silent' });
  return silent;
}

/**
 * Returns the logger a module writes to: the configured one (or a silent one),
 * bound to the module name when there is one.
 */
export function moduleLogger(options: ModuleOptions): Logger {
  const base = options.logger ?? silentLogger();
  return options.name ? base.child({ module: options.name }) : base;
}

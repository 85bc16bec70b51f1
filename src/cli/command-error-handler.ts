import chalk from 'chalk';
import { ConfigLoadError } from '../config/loader.js';
import { InfrastructureError } from '../errors.js';

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof ConfigLoadError) {
    console.error(chalk.red(`Error: ${err.message}`));
    process.exit(1);
  } else if (err instanceof InfrastructureError) {
    console.error(chalk.red(`Internal error (${err.stage}): ${err.message}`));
    process.exit(2);
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${msg}`));
    process.exit(1);
  }
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}

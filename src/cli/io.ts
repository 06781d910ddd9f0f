/**
 * Shared plumbing for the command-line tools.
 *
 * Commands run against an injected `CliIo` and return an exit code instead
 * of calling `process.exit()`, so tests can drive them in process.
 */

import { ConfigError } from '../errors.js';

export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export const PROCESS_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

/**
 * Consume a boolean flag (any of its spellings) from argv.
 */
export function takeFlag(argv: string[], names: string[]): boolean {
  let found = false;
  for (const name of names) {
    let index = argv.indexOf(name);
    while (index !== -1) {
      argv.splice(index, 1);
      found = true;
      index = argv.indexOf(name);
    }
  }
  return found;
}

/**
 * Consume a `-x value`, `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
export function takeOption(argv: string[], names: string[]): string | undefined {
  for (const name of names) {
    const indexEq = argv.findIndex(arg => arg.startsWith(`${name}=`));
    if (indexEq !== -1) {
      const value = argv[indexEq].slice(name.length + 1);
      argv.splice(indexEq, 1);
      if (!value) throw new ConfigError(`Missing value for ${name}`);
      return value;
    }

    const index = argv.indexOf(name);
    if (index === -1) continue;
    const value = argv[index + 1];
    argv.splice(index, 2);
    if (value === undefined || value === '') throw new ConfigError(`Missing value for ${name}`);
    return value;
  }
  return undefined;
}

/**
 * Ensure no unconsumed option is left in argv.
 */
export function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find(arg => arg.startsWith('-') && arg !== '-');
  if (unknown) throw new ConfigError(`Unknown option: ${unknown}`);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

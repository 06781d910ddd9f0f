#!/usr/bin/env node

/**
 * `org-unwrap` - join hard-wrapped paragraphs and list items of an outline
 * file. Prints to stdout unless `--output` is given.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { isEntryPoint } from '../entry.js';
import { ConfigError, InputError } from '../errors.js';
import { unwrapText } from '../unwrap.js';
import { assertNoUnknownFlags, errorMessage, PROCESS_IO, takeFlag, takeOption } from './io.js';
import type { CliIo } from './io.js';

export function usage(): string {
  return [
    'Unwrap paragraphs and list items in outline files',
    '',
    'Usage: org-unwrap [options] [file]',
    '       org-unwrap -i input.org [-o output.org]',
    '       org-unwrap --input input.org [--output output.org]',
    '',
    'Options:',
    '  -i, --input FILE    Input file path',
    '  -o, --output FILE   Output file path (defaults to stdout if not provided)',
    '  -h, --help          Show this help message',
    '',
    'If a file is provided without options, it is used as the input file',
    'and the result is printed to stdout.',
    '',
  ].join('\n');
}

/**
 * Run the CLI with argv (excluding `node` and the script path).
 */
export async function runUnwrapCli(args: string[], io: CliIo = PROCESS_IO): Promise<number> {
  const argv = [...args];

  if (argv.length === 0 || takeFlag(argv, ['-h', '--help'])) {
    io.stdout.write(usage());
    return 0;
  }

  try {
    const inputOption = takeOption(argv, ['-i', '--input']);
    const outputPath = takeOption(argv, ['-o', '--output']);
    assertNoUnknownFlags(argv);

    const inputPath = inputOption ?? argv.shift();
    if (!inputPath) throw new ConfigError('Missing input file');
    if (argv.length > 0) throw new ConfigError(`Unexpected arguments: ${argv.join(' ')}`);

    let text: string;
    try {
      text = await readFile(inputPath, 'utf-8');
    } catch (err) {
      throw new InputError(`Could not read file ${inputPath}: ${errorMessage(err)}`);
    }

    const result = unwrapText(text);
    if (outputPath) {
      await writeFile(outputPath, result, 'utf-8');
      io.stdout.write(`Processed file saved to: ${outputPath}\n`);
    } else {
      io.stdout.write(result.endsWith('\n') ? result : `${result}\n`);
    }
    return 0;
  } catch (err) {
    io.stderr.write(`Error: ${errorMessage(err)}\n\n`);
    io.stderr.write(usage());
    return 1;
  }
}

if (isEntryPoint(import.meta.url)) {
  const exitCode = await runUnwrapCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}

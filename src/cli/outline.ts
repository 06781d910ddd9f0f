#!/usr/bin/env node

/**
 * `org-outline` - parse an outline file, filter its headlines and write them
 * as JSON or YAML next to the input (or to `--output`).
 */

import { readFile, writeFile } from 'node:fs/promises';
import { compilePattern, parseLevel, parseOutputFormat, resolveRenderMode } from '../config.js';
import { isEntryPoint } from '../entry.js';
import { ConfigError, InputError } from '../errors.js';
import { filterHeadlines } from '../filters.js';
import type { FilterCriteria } from '../filters.js';
import { outputPathFor, prepareForOutput, serialize } from '../output.js';
import { parseOutline } from '../parser.js';
import { assertNoUnknownFlags, errorMessage, PROCESS_IO, takeFlag, takeOption } from './io.js';
import type { CliIo } from './io.js';

export function usage(): string {
  return [
    'Usage: org-outline [options] <file.org>',
    '',
    'Options:',
    '  -m, --max-level LEVEL           Show headlines with level <= LEVEL',
    '  -n, --min-level LEVEL           Show headlines with level >= LEVEL',
    '  -c, --custom-id REGEX           Show headlines with CUSTOM_ID property matching regex',
    '  -C, --section-custom-id REGEX   Show headlines within sections whose CUSTOM_ID matches regex',
    '  -T, --title REGEX               Show headlines whose title matches regex',
    '  -t, --section-title REGEX       Show headlines within sections whose title matches regex',
    '  -H, --html                      Convert titles and content to HTML',
    '  -M, --markdown                  Convert titles and content to Markdown',
    '  -l, --include-level             Include headline levels in the output',
    '  -f, --format FORMAT             Output format: json or yaml (default: json)',
    '  -o, --output FILE               Output file (default: input with the format extension)',
    '      --verbose                   Report structural problems found while parsing',
    '  -h, --help                      Show this help',
    '',
    'Examples:',
    '  org-outline notes.org                        # All headlines',
    '  org-outline -m 3 -n 2 notes.org              # Headlines with 2 <= level <= 3',
    '  org-outline -c "section[0-9]+" notes.org     # Headlines with CUSTOM_ID matching regex',
    '  org-outline -t "^(Tasks|Projects)$" notes.org  # Headlines within Tasks or Projects',
    '  org-outline -C "chapter\\d+" notes.org       # Headlines within sections with matching CUSTOM_ID',
    '  org-outline -H notes.org                     # Convert content to HTML',
    '  org-outline -M -f yaml notes.org             # Markdown content, YAML output',
    '',
  ].join('\n');
}

interface OutlineArgs {
  inputPath: string;
  outputPath?: string;
  criteria: FilterCriteria;
  html: boolean;
  markdown: boolean;
  includeLevel: boolean;
  verbose: boolean;
  format: string;
}

function parseArgs(argv: string[]): OutlineArgs {
  const criteria: FilterCriteria = {};

  const maxLevel = takeOption(argv, ['-m', '--max-level']);
  if (maxLevel !== undefined) criteria.maxLevel = parseLevel(maxLevel, '--max-level');
  const minLevel = takeOption(argv, ['-n', '--min-level']);
  if (minLevel !== undefined) criteria.minLevel = parseLevel(minLevel, '--min-level');

  const customId = takeOption(argv, ['-c', '--custom-id']);
  if (customId !== undefined) criteria.customId = compilePattern(customId, '--custom-id');
  const sectionCustomId = takeOption(argv, ['-C', '--section-custom-id']);
  if (sectionCustomId !== undefined) criteria.sectionCustomId = compilePattern(sectionCustomId, '--section-custom-id');
  const title = takeOption(argv, ['-T', '--title']);
  if (title !== undefined) criteria.title = compilePattern(title, '--title');
  const sectionTitle = takeOption(argv, ['-t', '--section-title']);
  if (sectionTitle !== undefined) criteria.sectionTitle = compilePattern(sectionTitle, '--section-title');

  const format = takeOption(argv, ['-f', '--format']) ?? 'json';
  const outputPath = takeOption(argv, ['-o', '--output']);
  const html = takeFlag(argv, ['-H', '--html']);
  const markdown = takeFlag(argv, ['-M', '--markdown']);
  const includeLevel = takeFlag(argv, ['-l', '--include-level']);
  const verbose = takeFlag(argv, ['--verbose']);

  assertNoUnknownFlags(argv);
  if (argv.length === 0) throw new ConfigError('Missing <file.org>');
  if (argv.length > 1) throw new ConfigError(`Unexpected arguments: ${argv.slice(1).join(' ')}`);

  return { inputPath: argv[0], outputPath, criteria, html, markdown, includeLevel, verbose, format };
}

async function readInput(inputPath: string): Promise<string> {
  try {
    return await readFile(inputPath, 'utf-8');
  } catch (err) {
    throw new InputError(`Could not read file ${inputPath}: ${errorMessage(err)}`);
  }
}

/**
 * Run the CLI with argv (excluding `node` and the script path).
 */
export async function runOutlineCli(args: string[], io: CliIo = PROCESS_IO): Promise<number> {
  const argv = [...args];

  if (argv.length === 0 || takeFlag(argv, ['-h', '--help'])) {
    io.stdout.write(usage());
    return 0;
  }

  try {
    const options = parseArgs(argv);
    const mode = resolveRenderMode({ html: options.html, markdown: options.markdown });
    const format = parseOutputFormat(options.format);

    const text = await readInput(options.inputPath);
    const { headlines, warnings } = parseOutline(text, { mode });
    if (options.verbose) {
      for (const warning of warnings) {
        io.stderr.write(`Warning: ${warning}\n`);
      }
    }

    const records = prepareForOutput(filterHeadlines(headlines, options.criteria), {
      includeLevel: options.includeLevel
    });
    const outputPath = options.outputPath ?? outputPathFor(options.inputPath, format);
    await writeFile(outputPath, serialize(records, format), 'utf-8');

    io.stdout.write(`${format.toUpperCase()} output written to ${outputPath}\n`);
    return 0;
  } catch (err) {
    io.stderr.write(`Error: ${errorMessage(err)}\n\n`);
    io.stderr.write(usage());
    return 1;
  }
}

if (isEntryPoint(import.meta.url)) {
  const exitCode = await runOutlineCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}

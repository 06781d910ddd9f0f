/**
 * Configuration resolution.
 *
 * Everything here runs before the core does: contradictory options are
 * rejected with a ConfigError instead of being discovered half way through a
 * parse.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { ConfigError } from './errors.js';
import type { RenderMode } from './types.js';

export const OUTPUT_FORMATS = ['json', 'yaml'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export const DEFAULT_PORT = 3000;

/**
 * Environment variable naming a server config file.
 */
export const CONFIG_ENV_VAR = 'ORG_OUTLINE_CONFIG';

export interface RenderFlags {
  html?: boolean;
  markdown?: boolean;
}

export interface ServerConfig {
  /** Port to listen on */
  port: number;
  /** Directory scanned for .org files */
  contentDir: string;
}

/**
 * Pick the render mode. Requesting both HTML and Markdown is fatal.
 */
export function resolveRenderMode(flags: RenderFlags): RenderMode {
  if (flags.html && flags.markdown) {
    throw new ConfigError('Both HTML and Markdown conversion requested');
  }
  if (flags.html) return 'html';
  if (flags.markdown) return 'markdown';
  return 'plain';
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function parseOutputFormat(value: string): OutputFormat {
  if (isOutputFormat(value)) return value;
  throw new ConfigError(`Invalid format ${JSON.stringify(value)}: must be one of ${OUTPUT_FORMATS.join(', ')}`);
}

/**
 * Parse a headline level option (positive integer).
 */
export function parseLevel(value: string, flag: string): number {
  const level = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(level) || level <= 0) {
    throw new ConfigError(`Invalid ${flag} ${JSON.stringify(value)}: Must be a positive number`);
  }
  return level;
}

/**
 * Compile a user-supplied regex.
 */
export function compilePattern(source: string, flag: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid ${flag} pattern ${JSON.stringify(source)}: ${reason}`);
  }
}

function parsePort(value: unknown, origin: string): number {
  const port = typeof value === 'string' ? parseInt(value, 10) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`Invalid port in ${origin}: ${JSON.stringify(value)}`);
  }
  return port;
}

/**
 * Read a JSON config file. A missing file falls back to defaults.
 */
async function readConfigFile(configPath: string): Promise<Partial<ServerConfig>> {
  if (!(await fs.pathExists(configPath))) {
    console.warn(`Config file ${configPath} not found, using defaults`);
    return {};
  }

  const raw: unknown = await fs.readJson(configPath);
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Config file ${configPath} must hold a JSON object`);
  }

  const config: Partial<ServerConfig> = {};
  if ('port' in raw && raw.port !== undefined) {
    config.port = parsePort(raw.port, configPath);
  }
  if ('contentDir' in raw && raw.contentDir !== undefined) {
    if (typeof raw.contentDir !== 'string') {
      throw new ConfigError(`Invalid contentDir in ${configPath}`);
    }
    config.contentDir = path.resolve(path.dirname(configPath), raw.contentDir);
  }
  console.log(`Loaded config from ${configPath}`);
  return config;
}

/**
 * Resolve server configuration: flags > config file > defaults.
 *
 * Supported flags: `--port=N`, `--content=DIR`, `--config=FILE`.
 */
export async function loadServerConfig(
  argv: string[],
  cwd: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ServerConfig> {
  const flags = new Map<string, string>();
  for (const arg of argv) {
    const match = arg.match(/^--(port|content|config)=(.*)$/);
    if (!match) {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
    flags.set(match[1], match[2]);
  }

  const configFile = flags.get('config') ?? env[CONFIG_ENV_VAR];
  const fromFile = configFile ? await readConfigFile(path.resolve(cwd, configFile)) : {};

  const portFlag = flags.get('port');
  const contentFlag = flags.get('content');

  return {
    port: portFlag !== undefined ? parsePort(portFlag, '--port') : fromFile.port ?? DEFAULT_PORT,
    contentDir: contentFlag !== undefined ? path.resolve(cwd, contentFlag) : fromFile.contentDir ?? cwd,
  };
}

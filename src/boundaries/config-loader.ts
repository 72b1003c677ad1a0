import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import YAML from 'yaml';
import { ConfigError, handleUnknownError, isConfigError } from '../errors/index';
import { ALLOWED_EXTS, DEFAULT_CONFIG_FILENAME } from '../config/constants';
import { parseRawDocument, processConfig, type ProcessConfigOptions } from '../config/process-config';
import type { ProcessConfigResult } from '../config/types';
import type { RawDocument } from '../types/raw';
import { readIniDocument } from './ini-reader';

export interface LoadedDocument {
  readonly path: string;
  readonly document: RawDocument;
}

export function resolveConfigPath(cwd: string = process.cwd(), configPath?: string): string {
  return configPath ? path.resolve(cwd, configPath) : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);
}

function parseDocument(text: string, ext: string): RawDocument {
  switch (ext) {
    case '.ini':
      return readIniDocument(text);
    case '.json':
      return parseRawDocument(JSON.parse(text));
    default:
      return parseRawDocument(YAML.parse(text));
  }
}

/**
 * Reads a configuration file into a raw document. The format follows the
 * extension: `.ini`, `.json`, `.yaml` or `.yml`.
 */
export function loadConfigDocument(cwd: string = process.cwd(), configPath?: string): LoadedDocument {
  const filePath = resolveConfigPath(cwd, configPath);

  if (!existsSync(filePath)) {
    throw new ConfigError(`Missing configuration file at ${filePath}`, 'environment');
  }

  const ext = path.extname(filePath).toLowerCase();
  if (!ALLOWED_EXTS.has(ext)) {
    throw new ConfigError(
      `Unsupported configuration file ${filePath}; expected one of ${Array.from(ALLOWED_EXTS).join(', ')}`,
      'environment'
    );
  }

  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`, 'environment');
  }

  try {
    return { path: filePath, document: parseDocument(text, ext) };
  } catch (e: unknown) {
    if (isConfigError(e)) throw e;
    const err = handleUnknownError(e, 'Parsing config file');
    throw new ConfigError(`Failed to parse ${filePath}: ${err.message}`, 'grammar');
  }
}

/**
 * Load and resolve configuration from a file
 */
export function loadConfig(
  cwd: string = process.cwd(),
  configPath?: string,
  options: ProcessConfigOptions = {}
): ProcessConfigResult {
  const { document } = loadConfigDocument(cwd, configPath);
  return processConfig(document, options);
}

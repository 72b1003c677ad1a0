import { z } from 'zod';
import { ConfigError } from '../errors/index';
import { convertSectionConfig } from '../fields/convert';
import { coalesceSections, type CoalescedDocument } from '../sections/coalesce';
import { formatSectionName } from '../sections/section-name';
import { documentEntries, type RawDocument, type RawSettings } from '../types/raw';
import {
  COMMAND_PROCESSING_SECTION,
  DATABASE_SECTION,
  DEVELOPER_SECTION,
  GLOBAL_SECTION,
  PUPPETDB_SECTION,
  READ_DATABASE_SECTION,
} from './constants';
import { configureDatabase, DATABASE_SECTION_MATCHER } from './database';
import { configureGlobals } from './globals';
import { detectHostDefaults, type HostDefaults } from './host-defaults';
import { checkRetirements } from './retirements';
import { commandProcessingFields, DEVELOPER_FIELDS, PUPPETDB_FIELDS } from './sections';
import type { ProcessConfigResult, ResolvedConfig } from './types';

export interface ProcessConfigOptions {
  readonly hostDefaults?: HostDefaults;
  /** Called with the resolved `[global] vardir`; throws when it is unusable. */
  readonly checkVardir?: (vardir: string | undefined) => void;
}

const RAW_VALUE_SCHEMA = z.union([z.string(), z.number(), z.boolean()]);
const RAW_SETTINGS_SCHEMA = z.record(z.string(), RAW_VALUE_SCHEMA);
const RAW_ENTRY_SCHEMA = z.tuple([z.string(), RAW_SETTINGS_SCHEMA]);

export const RAW_DOCUMENT_SCHEMA = z.union([z.array(RAW_ENTRY_SCHEMA), z.record(z.string(), RAW_SETTINGS_SCHEMA)]);

const INTERPRETED_SECTIONS = new Set([
  GLOBAL_SECTION,
  DEVELOPER_SECTION,
  READ_DATABASE_SECTION,
  COMMAND_PROCESSING_SECTION,
  PUPPETDB_SECTION,
]);

/**
 * Checks that an untyped value (parsed JSON or YAML) has the shape of a raw
 * configuration document.
 */
export function parseRawDocument(data: unknown): RawDocument {
  const result = RAW_DOCUMENT_SCHEMA.safeParse(data);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.') || '(document)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration document: ${details.join('; ')}`, 'schema');
  }
  return result.data;
}

/**
 * Every section left uninterpreted, keyed by its header as written. Matched
 * sections other than `database` keep their subsections as `name "sub"`.
 */
function otherSections(coalesced: CoalescedDocument): Record<string, RawSettings> {
  const entries: Array<[string, RawSettings]> = [];
  for (const [section, node] of coalesced.sections) {
    if (section === DATABASE_SECTION) continue;
    if (node.subsections.size === 0 || Object.keys(node.sectionwide).length > 0) {
      entries.push([section, { ...node.sectionwide }]);
    }
    for (const [subsection, settings] of node.subsections) {
      entries.push([formatSectionName({ section, subsection }).slice(1, -1), { ...settings }]);
    }
  }
  for (const [name, settings] of coalesced.passthrough) {
    if (!INTERPRETED_SECTIONS.has(name)) {
      entries.push([name, settings]);
    }
  }
  return Object.fromEntries(entries);
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null) return value;
  const children: Iterable<unknown> = value instanceof Map ? value.values() : Object.values(value);
  for (const child of children) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

/**
 * Validates, defaults and converts a whole configuration document.
 *
 * Retired settings that must stop startup are returned as `fatal` for the
 * caller to act on; every other problem throws a ConfigError.
 */
export function processConfig(document: RawDocument, options: ProcessConfigOptions = {}): ProcessConfigResult {
  const coalesced = coalesceSections(DATABASE_SECTION_MATCHER, documentEntries(document));

  const fatal = checkRetirements(coalesced);
  if (fatal.length > 0) {
    return { ok: false, fatal };
  }

  const { passthrough } = coalesced;
  const host = options.hostDefaults ?? detectHostDefaults();

  const global = configureGlobals(passthrough.get(GLOBAL_SECTION) ?? {});
  const developer = convertSectionConfig(DEVELOPER_FIELDS, passthrough.get(DEVELOPER_SECTION) ?? {}, DEVELOPER_SECTION);
  options.checkVardir?.(global.vardir);

  const { database, readDatabase } = configureDatabase(coalesced);
  const commandProcessing = convertSectionConfig(
    commandProcessingFields(host),
    passthrough.get(COMMAND_PROCESSING_SECTION) ?? {},
    COMMAND_PROCESSING_SECTION
  );
  const puppetdb = convertSectionConfig(PUPPETDB_FIELDS, passthrough.get(PUPPETDB_SECTION) ?? {}, PUPPETDB_SECTION);

  const config: ResolvedConfig = deepFreeze({
    global,
    developer,
    database,
    'read-database': readDatabase,
    'command-processing': commandProcessing,
    puppetdb,
    sections: otherSections(coalesced),
  });
  return { ok: true, config };
}

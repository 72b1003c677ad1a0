import YAML from 'yaml';
import { DATABASE_SECTION } from '../config/constants';
import type { WriteDatabaseProfile } from '../config/sections';
import type { ResolvedConfig } from '../config/types';
import { formatSettings } from '../fields/convert';
import { formatSectionName } from '../sections/section-name';
import type { ResolvedSection } from '../sections/subsections';
import type { RawSettings, RawValue } from '../types/raw';
import type { OutputFormat } from '../schemas/cli-schemas';

export type PlainConfig = Record<string, Record<string, RawValue>>;

function databaseEntries(
  section: ResolvedSection<WriteDatabaseProfile>
): Array<[string, Record<string, RawValue>]> {
  if (section.kind === 'sectionwide') {
    return [[DATABASE_SECTION, formatSettings(section.settings)]];
  }
  return Array.from(section.subsections, ([subsection, settings]): [string, Record<string, RawValue>] => [
    formatSectionName({ section: DATABASE_SECTION, subsection }).slice(1, -1),
    formatSettings(settings),
  ]);
}

function copy(settings: RawSettings): Record<string, RawValue> {
  return { ...settings };
}

/**
 * Flattens a resolved configuration into header → settings, with values in
 * their raw form. Database subsections become `database "name"` headers.
 */
export function toPlain(config: ResolvedConfig): PlainConfig {
  const entries: Array<[string, Record<string, RawValue>]> = [
    ['global', formatSettings(config.global)],
    ['developer', formatSettings(config.developer)],
    ...databaseEntries(config.database),
    ['read-database', formatSettings(config['read-database'])],
    ['command-processing', formatSettings(config['command-processing'])],
    ['puppetdb', formatSettings(config.puppetdb)],
    ...Object.entries(config.sections).map(([header, settings]): [string, Record<string, RawValue>] => [
      header,
      copy(settings),
    ]),
  ];
  return Object.fromEntries(entries);
}

export function formatIni(plain: PlainConfig): string {
  const blocks: string[] = [];
  for (const [header, settings] of Object.entries(plain)) {
    const lines = [`[${header}]`];
    for (const [key, value] of Object.entries(settings)) {
      lines.push(`${key} = ${String(value)}`);
    }
    blocks.push(lines.join('\n'));
  }
  return `${blocks.join('\n\n')}\n`;
}

export function formatConfig(config: ResolvedConfig, format: OutputFormat): string {
  const plain = toPlain(config);
  switch (format) {
    case 'json':
      return `${JSON.stringify(plain, null, 2)}\n`;
    case 'yaml':
      return YAML.stringify(plain);
    case 'ini':
      return formatIni(plain);
  }
}

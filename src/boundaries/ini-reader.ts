import { ConfigError } from '../errors/index';
import type { RawEntry } from '../types/raw';

const stripQuotes = (str: string): string =>
  str.replace(/^"(.*)"$/, '$1').replace(/^'(.*)'$/, '$1');

/**
 * Splits INI text into `[header, settings]` entries in file order.
 *
 * Header text is kept as written between the brackets (e.g.
 * `database "primary"`); repeated headers stay separate entries. Values are
 * strings with surrounding quotes removed.
 */
export function readIniDocument(text: string): RawEntry[] {
  const entries: Array<[string, Map<string, string>]> = [];
  let current: Map<string, string> | null = null;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    // Section header
    const sectionMatch = line.match(/^\[(.*)\]$/);
    if (sectionMatch) {
      current = new Map();
      entries.push([(sectionMatch[1] ?? '').trim(), current]);
      continue;
    }

    const m = line.match(/^([A-Za-z0-9_.?-]+)\s*[=:]\s*(.*)$/);
    if (!m || !m[1]) {
      throw new ConfigError(`Line ${i + 1}: expected "key = value" or a [section] header`, 'grammar');
    }
    if (!current) {
      throw new ConfigError(`Line ${i + 1}: ${m[1]} must be inside a [section]`, 'grammar');
    }
    current.set(m[1], stripQuotes((m[2] ?? '').trim()));
  }

  return entries.map(([header, settings]): RawEntry => [header, Object.fromEntries(settings)]);
}

import { warn } from '../output/logger';
import type { CoalescedDocument } from '../sections/coalesce';
import type { RawSettings } from '../types/raw';
import {
  COMMAND_PROCESSING_SECTION,
  DATABASE_SECTION,
  GLOBAL_SECTION,
  LOG_PREFIX,
  READ_DATABASE_SECTION,
} from './constants';

export interface FatalIssue {
  readonly section: string;
  readonly key: string;
  readonly message: string;
}

const RETIRED_SETTINGS: ReadonlyArray<readonly [section: string, key: string]> = [
  [COMMAND_PROCESSING_SECTION, 'max-frame-size'],
  [COMMAND_PROCESSING_SECTION, 'memory-usage'],
  [COMMAND_PROCESSING_SECTION, 'store-usage'],
  [COMMAND_PROCESSING_SECTION, 'temp-usage'],
  [DATABASE_SECTION, 'classname'],
  [DATABASE_SECTION, 'conn-keep-alive'],
  [DATABASE_SECTION, 'log-slow-statements'],
  [DATABASE_SECTION, 'statements-cache-size'],
  [DATABASE_SECTION, 'subprotocol'],
  [READ_DATABASE_SECTION, 'classname'],
  [READ_DATABASE_SECTION, 'conn-keep-alive'],
  [READ_DATABASE_SECTION, 'log-slow-statements'],
  [READ_DATABASE_SECTION, 'statements-cache-size'],
  [READ_DATABASE_SECTION, 'subprotocol'],
  [GLOBAL_SECTION, 'catalog-hash-conflict-debugging'],
];

export const URL_PREFIX_GUIDANCE = [
  'The configuration item `url-prefix` in the [global] section is retired, please remove this item from your config.',
  'PuppetDB has a non-configurable context route of `/pdb`.',
  'Consult the documentation for more details.',
].join(' ');

// Every settings block that belongs to `section`, database subsections included.
function sectionBlocks(coalesced: CoalescedDocument, section: string): RawSettings[] {
  const node = coalesced.sections.get(section);
  if (node) {
    return [node.sectionwide, ...node.subsections.values()];
  }
  const settings = coalesced.passthrough.get(section);
  return settings ? [settings] : [];
}

/**
 * Warns about retired settings and returns the ones that must stop startup.
 */
export function checkRetirements(coalesced: CoalescedDocument): FatalIssue[] {
  for (const [section, key] of RETIRED_SETTINGS) {
    if (sectionBlocks(coalesced, section).some((settings) => key in settings)) {
      warn(`${LOG_PREFIX} The [${section}] ${key} config option has been retired and will be ignored.`);
    }
  }

  if (coalesced.passthrough.has('repl')) {
    warn(
      `${LOG_PREFIX} The configuration block [repl] is now retired and will be ignored. Use [nrepl] instead. Consult the documentation for more details.`
    );
  }

  const fatal: FatalIssue[] = [];
  if (coalesced.passthrough.get(GLOBAL_SECTION)?.['url-prefix'] !== undefined) {
    fatal.push({ section: GLOBAL_SECTION, key: 'url-prefix', message: URL_PREFIX_GUIDANCE });
  }
  return fatal;
}

import { ConfigError } from '../errors/index';
import { documentEntries, type RawDocument, type RawSettings } from '../types/raw';
import { parseSectionName } from './section-name';

export interface SectionNode {
  readonly sectionwide: RawSettings;
  readonly subsections: ReadonlyMap<string, RawSettings>;
}

export interface CoalescedDocument {
  readonly sections: ReadonlyMap<string, SectionNode>;
  readonly passthrough: ReadonlyMap<string, RawSettings>;
}

export type SectionMatcher = (header: string) => boolean;

export const EMPTY_SECTION: SectionNode = { sectionwide: {}, subsections: new Map() };

/**
 * Builds a matcher that only accepts headers the pattern matches in full.
 */
export function fullMatch(pattern: RegExp): SectionMatcher {
  const anchored = new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gy]/g, ''));
  return (header) => anchored.test(header);
}

interface NodeBuilder {
  sectionwide: RawSettings | undefined;
  subsections: Map<string, RawSettings>;
}

/**
 * Groups the headers accepted by `matcher` into a section tree. Every other
 * entry is copied to `passthrough`; repeated passthrough headers merge.
 */
export function coalesceSections(matcher: SectionMatcher, document: RawDocument): CoalescedDocument {
  const builders = new Map<string, NodeBuilder>();
  const passthrough = new Map<string, RawSettings>();

  for (const [header, settings] of documentEntries(document)) {
    if (!matcher(header)) {
      passthrough.set(header, { ...passthrough.get(header), ...settings });
      continue;
    }

    const { section, subsection } = parseSectionName(`[${header}]`);
    let node = builders.get(section);
    if (!node) {
      node = { sectionwide: undefined, subsections: new Map() };
      builders.set(section, node);
    }

    if (subsection === undefined) {
      if (section !== header) {
        throw new ConfigError(
          `error: parsed config section [${JSON.stringify(header)}] incorrectly (${JSON.stringify(section)} != ${JSON.stringify(header)}); please report`,
          'invariant'
        );
      }
      if (node.sectionwide !== undefined) {
        throw new ConfigError(
          `error: multiple [${JSON.stringify(header)}] sections in config file`,
          'duplicate-section'
        );
      }
      node.sectionwide = settings;
      continue;
    }

    if (node.subsections.has(subsection)) {
      throw new ConfigError(
        `error: multiple [${JSON.stringify(header)}] subsections in config file`,
        'duplicate-subsection'
      );
    }
    node.subsections.set(subsection, settings);
  }

  const sections = new Map<string, SectionNode>();
  for (const [name, node] of builders) {
    sections.set(name, { sectionwide: node.sectionwide ?? {}, subsections: node.subsections });
  }
  return { sections, passthrough };
}

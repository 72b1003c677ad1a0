import type { RawSettings } from '../types/raw';
import type { SectionNode } from './coalesce';

export type ResolvedSection<R> =
  | { readonly kind: 'sectionwide'; readonly settings: R }
  | { readonly kind: 'subsections'; readonly subsections: ReadonlyMap<string, R> };

/**
 * Called once with `subsection` undefined for the sectionwide settings, then
 * once per subsection with the sectionwide result as `sectionwide`.
 */
export type SectionTransform<R> = (
  subsection: string | undefined,
  sectionwide: R | undefined,
  settings: RawSettings
) => R;

/**
 * Folds `f` over one section. Subsections always see the already transformed
 * sectionwide result. When a section has subsections, only their results are
 * returned.
 */
export function updateSectionSettings<R>(node: SectionNode, f: SectionTransform<R>): ResolvedSection<R> {
  const sectionwide = f(undefined, undefined, node.sectionwide);
  if (node.subsections.size === 0) {
    return { kind: 'sectionwide', settings: sectionwide };
  }

  const subsections = new Map<string, R>();
  for (const [name, settings] of node.subsections) {
    subsections.set(name, f(name, sectionwide, settings));
  }
  return { kind: 'subsections', subsections };
}

/**
 * Turns a raw fold result back into a node so that another fold can run.
 */
export function nodeFromSection(section: ResolvedSection<RawSettings>): SectionNode {
  if (section.kind === 'sectionwide') {
    return { sectionwide: section.settings, subsections: new Map() };
  }
  return { sectionwide: {}, subsections: section.subsections };
}

/**
 * Lists the emitted results with their subsection name (undefined for a
 * section without subsections).
 */
export function sectionProfiles<R>(section: ResolvedSection<R>): Array<[string | undefined, R]> {
  if (section.kind === 'sectionwide') {
    return [[undefined, section.settings]];
  }
  return Array.from(section.subsections);
}

import { ConfigError } from '../errors/index';

export interface SectionName {
  readonly section: string;
  readonly subsection?: string;
}

// [section] or [section "subsection"]; a subset of the git-config(1) syntax.
const HEADER_PATTERN = /^\[([-0-9a-zA-Z]+)(?:[ \t]+([\p{L}\p{N}\p{P}\p{S}\s]+))?\]$/u;
const TRAILING_BACKSLASHES = /(\\+)"$/;
const ESCAPE_SEQUENCE = /\\(.)/gu;

function grammarError(message: string): ConfigError {
  return new ConfigError(message, 'grammar');
}

/**
 * Parses a section header such as `[database "primary"]`.
 * Escapes in the subsection are resolved: every `\X` becomes `X`.
 */
export function parseSectionName(header: string): SectionName {
  const m = header.match(HEADER_PATTERN);
  const section = m?.[1];
  if (!m || !section) {
    throw grammarError(`error: invalid section name ${JSON.stringify(header)}`);
  }

  const subtext = m[2];
  if (subtext === undefined) {
    return { section };
  }

  if (!subtext.startsWith('"')) {
    throw grammarError(
      `error: config subsection ${JSON.stringify(header)} must start with a double-quote`
    );
  }
  const unterminated = grammarError(
    `error: config subsection ${JSON.stringify(header)} must end with an unescaped double-quote`
  );
  if (subtext.length < 2 || !subtext.endsWith('"')) {
    throw unterminated;
  }
  const backslashes = subtext.match(TRAILING_BACKSLASHES)?.[1];
  if (backslashes !== undefined && backslashes.length % 2 === 1) {
    throw unterminated;
  }

  const quoted = subtext.slice(1, -1);
  return { section, subsection: quoted.replace(ESCAPE_SEQUENCE, '$1') };
}

/**
 * Inverse of parseSectionName.
 */
export function formatSectionName(name: SectionName): string {
  if (name.subsection === undefined) {
    return `[${name.section}]`;
  }
  const escaped = name.subsection.replace(/[\\"]/g, (c) => `\\${c}`);
  return `[${name.section} "${escaped}"]`;
}

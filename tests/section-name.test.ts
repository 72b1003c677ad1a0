import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { formatSectionName, parseSectionName } from '../src/sections/section-name';
import { ConfigError, isConfigError } from '../src/errors/index';
import { catchError } from './utils';

const SUBSECTION_CHARS = /^[\p{L}\p{N}\p{P}\p{S}\s]*$/u;

describe('parseSectionName', () => {
  it('parses a plain section', () => {
    expect(parseSectionName('[database]')).toEqual({ section: 'database' });
    expect(parseSectionName('[command-processing]')).toEqual({ section: 'command-processing' });
  });

  it('parses a quoted subsection', () => {
    expect(parseSectionName('[database "primary"]')).toEqual({ section: 'database', subsection: 'primary' });
  });

  it('accepts tabs between section and subsection', () => {
    expect(parseSectionName('[database\t"replica"]')).toEqual({ section: 'database', subsection: 'replica' });
  });

  it('resolves escapes inside the subsection', () => {
    expect(parseSectionName('[database "a \\"quoted\\" name"]')).toEqual({
      section: 'database',
      subsection: 'a "quoted" name',
    });
    expect(parseSectionName('[database "x\\y"]').subsection).toBe('xy');
    expect(parseSectionName('[database "primary\\\\"]').subsection).toBe('primary\\');
  });

  it('rejects section names outside [-0-9a-zA-Z]', () => {
    for (const header of ['[]', '[data_base]', 'database', '[database']) {
      const err = catchError(() => parseSectionName(header));
      expect(isConfigError(err, 'grammar')).toBe(true);
    }
    expect(() => parseSectionName('[data_base]')).toThrow('error: invalid section name "[data_base]"');
  });

  it('requires the subsection to start with a double-quote', () => {
    expect(() => parseSectionName('[database primary]')).toThrow(
      'error: config subsection "[database primary]" must start with a double-quote'
    );
  });

  it('rejects unterminated subsections', () => {
    const headers = ['[database "primary]', '[database "]', '[database "primary\\"]', '[database "a\\\\\\"]'];
    for (const header of headers) {
      const err = catchError(() => parseSectionName(header));
      expect(err).toBeInstanceOf(ConfigError);
      expect(isConfigError(err, 'grammar')).toBe(true);
      expect(err instanceof Error ? err.message : '').toBe(
        `error: config subsection ${JSON.stringify(header)} must end with an unescaped double-quote`
      );
    }
  });

  it('round-trips formatted headers', () => {
    fc.assert(
      fc.property(
        fc.stringMatching(/^[-0-9a-zA-Z]{1,12}$/),
        fc.string({ maxLength: 20 }).filter((s) => SUBSECTION_CHARS.test(s)),
        (section, subsection) => {
          expect(parseSectionName(formatSectionName({ section, subsection }))).toEqual({ section, subsection });
          expect(parseSectionName(formatSectionName({ section }))).toEqual({ section });
        }
      )
    );
  });
});

describe('formatSectionName', () => {
  it('escapes backslashes and quotes', () => {
    expect(formatSectionName({ section: 'database' })).toBe('[database]');
    expect(formatSectionName({ section: 'database', subsection: 'a "b" \\c' })).toBe('[database "a \\"b\\" \\\\c"]');
  });
});

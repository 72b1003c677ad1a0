import { z } from 'zod';
import type { RawValue } from '../types/raw';
import { Period, type PeriodUnit } from './period';

export type DefaultValue = RawValue | (() => RawValue);

/**
 * Declarative description of one configuration key.
 *
 * The incoming side is `raw` (coarse shape of the value as written),
 * `required` and `fallback`; the outgoing side is the semantic value produced
 * by `convert` and checked by `accepts`. `present` is true when the key always
 * exists once resolved, i.e. it is required or has a default.
 */
export interface Field<T, Present extends boolean = boolean> {
  readonly type: string;
  readonly raw: z.ZodType<RawValue>;
  readonly required: boolean;
  readonly present: Present;
  readonly fallback?: DefaultValue;
  readonly convert: (value: RawValue) => T;
  readonly accepts: (value: unknown) => boolean;
}

export type AnyField = Field<unknown>;
export type SectionSpec = Readonly<Record<string, AnyField>>;

type ValueOf<F> = F extends Field<infer T> ? T : never;

type PresentKeys<S extends SectionSpec> = {
  [K in keyof S]: S[K]['present'] extends true ? K : never;
}[keyof S];

/**
 * The resolved form of a section: present keys are required, the others optional.
 */
export type Resolved<S extends SectionSpec> = {
  readonly [K in PresentKeys<S>]: ValueOf<S[K]>;
} & {
  readonly [K in Exclude<keyof S, PresentKeys<S>>]?: ValueOf<S[K]>;
};

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;
const BOOLEAN_PATTERN = /^(true|false)$/i;
const LIST_SEPARATOR = /[,;]/;

const INTEGER_LIKE = z.union([
  z.number().int(),
  z.string().regex(INTEGER_PATTERN, 'expected an integer'),
]);
const STRING_LIKE = z.union([z.string(), z.number()]);
const BOOLEAN_LIKE = z.union([z.boolean(), z.string()]);
const DURATION_LIKE = z.union([z.number().int(), z.string()]);

function field<T>(
  type: string,
  raw: z.ZodType<RawValue>,
  convert: (value: RawValue) => T,
  accepts: (value: unknown) => boolean
): Field<T, false> {
  return { type, raw, required: false, present: false, convert, accepts };
}

function parseInteger(value: RawValue): number {
  if (typeof value === 'boolean' || (typeof value === 'string' && !INTEGER_PATTERN.test(value))) {
    throw new Error('expected an integer');
  }
  const n = Number(value);
  if (!Number.isSafeInteger(n)) {
    throw new Error('expected an integer');
  }
  return n;
}

export function integer(options: { min?: number } = {}): Field<number, false> {
  const { min } = options;
  return field(
    min === undefined ? 'integer' : `integer >= ${min}`,
    INTEGER_LIKE,
    (value) => {
      const n = parseInteger(value);
      if (min !== undefined && n < min) {
        throw new Error(`must be at least ${min}`);
      }
      return n;
    },
    (value) => typeof value === 'number' && Number.isSafeInteger(value) && (min === undefined || value >= min)
  );
}

export function nonNegativeInteger(): Field<number, false> {
  return integer({ min: 0 });
}

export function boolean(): Field<boolean, false> {
  return field(
    'boolean',
    BOOLEAN_LIKE,
    (value) => {
      if (typeof value === 'boolean') return value;
      const text = String(value).trim();
      if (!BOOLEAN_PATTERN.test(text)) {
        throw new Error('expected true or false');
      }
      return text.toLowerCase() === 'true';
    },
    (value) => typeof value === 'boolean'
  );
}

export function string(): Field<string, false> {
  return field('string', STRING_LIKE, (value) => String(value), (value) => typeof value === 'string');
}

export function enumeration<V extends string>(values: readonly [V, ...V[]]): Field<V, false> {
  return field(
    `one of ${values.join(', ')}`,
    z.string(),
    (value) => {
      const member = values.find((v) => v === value);
      if (member === undefined) {
        throw new Error(`expected one of ${values.join(', ')}`);
      }
      return member;
    },
    (value) => typeof value === 'string' && values.some((v) => v === value)
  );
}

export function stringList(): Field<readonly string[], false> {
  return field(
    'list of strings',
    z.string(),
    (value) =>
      String(value)
        .split(LIST_SEPARATOR)
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
    (value) => Array.isArray(value) && value.every((s) => typeof s === 'string')
  );
}

// A bare integer counts `unit`s; a period string must be a whole number of them.
function wholePeriod(type: string, unit: PeriodUnit): Field<Period, false> {
  return field(
    type,
    DURATION_LIKE,
    (value) => {
      if (typeof value === 'number' || (typeof value === 'string' && INTEGER_PATTERN.test(value))) {
        const n = parseInteger(value);
        if (n < 0) {
          throw new Error('must not be negative');
        }
        return new Period(n, unit);
      }
      return Period.parse(String(value)).to(unit);
    },
    (value) => value instanceof Period && value.unit === unit
  );
}

export function minutes(): Field<Period, false> {
  return wholePeriod('minutes', 'm');
}

export function days(): Field<Period, false> {
  return wholePeriod('days', 'd');
}

export function period(): Field<Period, false> {
  return field(
    'period',
    z.string(),
    (value) => Period.parse(String(value)),
    (value) => value instanceof Period
  );
}

/**
 * Marks a field as defaulted; `fallback` is a raw value or a provider called
 * when the key is absent.
 */
export function defaulted<T>(f: Field<T>, fallback: DefaultValue): Field<T, true> {
  return { ...f, fallback, present: true };
}

export function required<T>(f: Field<T>): Field<T, true> {
  return { ...f, required: true, present: true };
}

import { z } from 'zod';
import { ConfigError, handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';
import { LOG_PREFIX } from '../config/constants';
import type { RawSettings, RawValue } from '../types/raw';
import type { Resolved, SectionSpec } from './field';
import { Period } from './period';

function declares(spec: SectionSpec, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(spec, key);
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function unknownKeys(spec: SectionSpec, settings: Readonly<Record<string, unknown>>): string[] {
  return Object.keys(settings).filter((key) => !declares(spec, key));
}

export function warnUnknownKeys(spec: SectionSpec, settings: RawSettings, section: string): void {
  for (const key of unknownKeys(spec, settings)) {
    warn(
      `${LOG_PREFIX} The configuration item \`${key}\` in [${section}] does not exist and should be removed from the config.`
    );
  }
}

export function stripUnknownKeys<V>(spec: SectionSpec, settings: Readonly<Record<string, V>>): Record<string, V> {
  const out: Record<string, V> = {};
  for (const [key, value] of Object.entries(settings)) {
    if (declares(spec, key)) {
      out[key] = value;
    }
  }
  return out;
}

export function incomingSchema(spec: SectionSpec) {
  const shape: z.ZodRawShape = {};
  for (const [key, f] of Object.entries(spec)) {
    shape[key] = f.required ? f.raw : f.raw.optional();
  }
  return z.object(shape);
}

export function validateIncoming(spec: SectionSpec, settings: RawSettings, section: string): void {
  const result = incomingSchema(spec).safeParse(settings);
  if (result.success) return;

  const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new ConfigError(`Invalid [${section}] configuration: ${details.join('; ')}`, 'schema');
}

export function applyDefaults(spec: SectionSpec, settings: RawSettings): Record<string, RawValue> {
  const out: Record<string, RawValue> = { ...settings };
  for (const [key, f] of Object.entries(spec)) {
    if (out[key] === undefined && f.fallback !== undefined) {
      out[key] = typeof f.fallback === 'function' ? f.fallback() : f.fallback;
    }
  }
  return out;
}

export function convertSettings(spec: SectionSpec, settings: RawSettings, section: string): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(settings)) {
    const f = spec[key];
    if (!f || !declares(spec, key)) {
      // left for validateOutgoing to report
      out[key] = value;
      continue;
    }
    try {
      out[key] = f.convert(value);
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Converting ${key}`);
      throw new ConfigError(
        `Invalid value for [${section}] ${key}: ${JSON.stringify(value)} (${err.message})`,
        'conversion'
      );
    }
  }
  return out;
}

export function outgoingIssues(spec: SectionSpec, value: Readonly<Record<string, unknown>>): string[] {
  const issues = unknownKeys(spec, value).map((key) => `unexpected key ${key}`);
  for (const [key, f] of Object.entries(spec)) {
    const v = value[key];
    if (v === undefined) {
      if (f.present) issues.push(`missing ${key}`);
    } else if (!f.accepts(v)) {
      issues.push(`${key} is not a valid ${f.type}`);
    }
  }
  return issues;
}

export function conformsTo<S extends SectionSpec>(spec: S, value: unknown): value is Resolved<S> {
  return isRecord(value) && outgoingIssues(spec, value).length === 0;
}

export function validateOutgoing<S extends SectionSpec>(
  spec: S,
  value: Readonly<Record<string, unknown>>,
  section: string
): Resolved<S> {
  if (conformsTo(spec, value)) {
    return value;
  }
  throw new ConfigError(
    `Invalid resolved [${section}] configuration: ${outgoingIssues(spec, value).join('; ')}`,
    'schema'
  );
}

/**
 * Warns about and strips unknown keys, validates the raw shape, applies
 * defaults and converts every value to its semantic type.
 */
export function convertSectionConfig<S extends SectionSpec>(
  spec: S,
  settings: RawSettings,
  section: string
): Resolved<S> {
  warnUnknownKeys(spec, settings, section);
  const known = stripUnknownKeys(spec, settings);
  validateIncoming(spec, known, section);
  const converted = convertSettings(spec, applyDefaults(spec, known), section);
  return validateOutgoing(spec, converted, section);
}

export function formatValue(value: unknown): RawValue {
  if (value instanceof Period) return value.toString();
  if (Array.isArray(value)) return value.map(String).join(',');
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

/**
 * Expresses resolved values back in their raw form.
 */
export function formatSettings(settings: Readonly<Record<string, unknown>>): Record<string, RawValue> {
  const out: Record<string, RawValue> = {};
  for (const [key, value] of Object.entries(settings)) {
    if (value !== undefined) {
      out[key] = formatValue(value);
    }
  }
  return out;
}

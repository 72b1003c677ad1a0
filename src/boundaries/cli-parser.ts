import {
  INIT_OPTIONS_SCHEMA,
  RESOLVE_OPTIONS_SCHEMA,
  VALIDATE_OPTIONS_SCHEMA,
  type InitOptions,
  type ResolveOptions,
  type ValidateOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseResolveOptions(raw: unknown): ResolveOptions {
  try {
    return RESOLVE_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid resolve options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Resolve option parsing');
    throw new ValidationError(`Resolve option parsing failed: ${err.message}`);
  }
}

export function parseValidateOptions(raw: unknown): ValidateOptions {
  try {
    return VALIDATE_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid validate options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Validate option parsing');
    throw new ValidationError(`Validate option parsing failed: ${err.message}`);
  }
}

export function parseInitOptions(raw: unknown): InitOptions {
  try {
    return INIT_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      throw new ValidationError(`Invalid init options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Init option parsing');
    throw new ValidationError(`Init option parsing failed: ${err.message}`);
  }
}

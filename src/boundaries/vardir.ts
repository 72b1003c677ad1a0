import { accessSync, constants, existsSync, statSync } from 'fs';
import * as path from 'path';
import { ConfigError } from '../errors/index';

function environmentError(message: string): ConfigError {
  return new ConfigError(message, 'environment');
}

/**
 * Checks that `[global] vardir` names an existing, writable directory.
 */
export function validateVardir(vardir: string | undefined): void {
  if (vardir === undefined || vardir.trim() === '') {
    throw environmentError("Required setting 'vardir' is not specified. Please set it to a writable directory.");
  }
  if (!path.isAbsolute(vardir)) {
    throw environmentError(`Vardir ${vardir} must be an absolute path.`);
  }
  if (!existsSync(vardir)) {
    throw environmentError(`Vardir ${vardir} does not exist. Please create it and ensure it is writable.`);
  }
  if (!statSync(vardir).isDirectory()) {
    throw environmentError(`Vardir ${vardir} is not a directory.`);
  }
  try {
    accessSync(vardir, constants.W_OK);
  } catch {
    throw environmentError(`Vardir ${vardir} is not writable.`);
  }
}

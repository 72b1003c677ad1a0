import type { Command } from 'commander';
import * as path from 'path';
import { loadConfig, parseValidateOptions, resolveConfigPath } from '../boundaries/index';
import { handleUnknownError } from '../errors/index';
import { withWarningSink } from '../output/logger';
import { printFileHeader, printSummary, printValidationRow } from '../output/reporter';
import { sectionProfiles } from '../sections/subsections';
import { processOptions } from './resolve-command';

/*
 * Registers the 'validate' command with Commander.
 * Resolves the configuration without printing it, listing every warning and
 * error found on the way.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check a configuration file and report warnings and errors')
    .argument('[file]', 'configuration file (.ini, .json, .yaml); defaults to ./config.ini')
    .option('--skip-vardir-check', 'Do not check that vardir is a writable directory')
    .action((file: string | undefined, rawOpts: unknown) => {
      let validateOptions;
      try {
        validateOptions = parseValidateOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing validate command options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      const options = processOptions(validateOptions.skipVardirCheck);
      const warnings: string[] = [];
      const errors: string[] = [];
      let profiles = 0;

      try {
        const result = withWarningSink(
          (message) => warnings.push(message),
          () => loadConfig(process.cwd(), file, options)
        );
        if (result.ok) {
          profiles = sectionProfiles(result.config.database).length;
        } else {
          for (const issue of result.fatal) errors.push(`[${issue.section}] ${issue.key}: ${issue.message}`);
        }
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Validating configuration');
        errors.push(err.message);
      }

      const configPath = resolveConfigPath(process.cwd(), file);
      printFileHeader(path.relative(process.cwd(), configPath) || configPath);
      for (const m of errors) printValidationRow('error', m);
      for (const m of warnings) printValidationRow('warning', m);
      console.log('');

      printSummary(errors.length, warnings.length, profiles);

      // Exit with appropriate code
      process.exit(errors.length > 0 ? 1 : 0);
    });
}

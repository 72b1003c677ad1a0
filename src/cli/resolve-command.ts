import type { Command } from 'commander';
import { loadConfig, parseResolveOptions, validateVardir } from '../boundaries/index';
import type { ProcessConfigOptions } from '../config/process-config';
import type { FatalIssue } from '../config/retirements';
import { handleUnknownError } from '../errors/index';
import { formatConfig } from '../output/config-formatter';
import { error, setSilentMode } from '../output/logger';
import { OUTPUT_FORMATS } from '../schemas/cli-schemas';

export function processOptions(skipVardirCheck: boolean): ProcessConfigOptions {
  return skipVardirCheck ? {} : { checkVardir: validateVardir };
}

export function printFatalIssues(fatal: readonly FatalIssue[]): void {
  for (const issue of fatal) {
    error(`Error: [${issue.section}] ${issue.key}: ${issue.message}`);
  }
}

/*
 * Registers the 'resolve' command with Commander.
 * Prints the fully resolved configuration to stdout.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve a configuration file and print the result')
    .argument('[file]', 'configuration file (.ini, .json, .yaml); defaults to ./config.ini')
    .option('--output <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, 'json')
    .option('--quiet', 'Suppress warnings')
    .option('--skip-vardir-check', 'Do not check that vardir is a writable directory')
    .action((file: string | undefined, rawOpts: unknown) => {
      let options;
      try {
        options = parseResolveOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing resolve command options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      setSilentMode(options.quiet);

      let result;
      try {
        result = loadConfig(process.cwd(), file, processOptions(options.skipVardirCheck));
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Resolving configuration');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      if (!result.ok) {
        printFatalIssues(result.fatal);
        process.exit(1);
      }

      process.stdout.write(formatConfig(result.config, options.output));
    });
}

import type { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import * as path from 'path';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';
import { parseInitOptions } from '../boundaries/index';
import { handleUnknownError } from '../errors/index';
import { log } from '../output/logger';

// Template for a starter config.ini
export const CONFIG_TEMPLATE = `# sectionconf configuration
[global]
vardir = /var/lib/puppetdb

[database]
subname = //localhost:5432/puppetdb
user = puppetdb
password = change-me
gc-interval = 60
report-ttl = 14d

# Settings above are shared by every [database "name"] subsection.
# [database "primary"]
# subname = //db-primary:5432/puppetdb

[command-processing]
reject-large-commands = false
`;

/**
 * Registers the 'init' command with Commander.
 * Writes a starter configuration file into the current directory.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Create a starter ${DEFAULT_CONFIG_FILENAME} in the current directory`)
    .option('--force', 'Overwrite an existing configuration file')
    .action((rawOpts: unknown) => {
      let opts;
      try {
        opts = parseInitOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing init command options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      const configPath = path.join(process.cwd(), DEFAULT_CONFIG_FILENAME);
      if (!opts.force && existsSync(configPath)) {
        console.error(`Error: ${DEFAULT_CONFIG_FILENAME} already exists.`);
        console.error(`\nUse --force to overwrite it.`);
        process.exit(1);
      }

      try {
        writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Writing configuration file');
        console.error(`Error: Failed to write configuration file: ${err.message}`);
        process.exit(1);
      }

      log(`✓ Created ${DEFAULT_CONFIG_FILENAME}\n`);
      log(`Next steps:`);
      log(`  1. Point vardir at a writable directory`);
      log(`  2. Set the database subname and credentials`);
      log(`  3. Run 'sectionconf validate' to check the result`);
    });
}

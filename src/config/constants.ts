/**
 * Configuration constants
 */

export const LOG_PREFIX = '[sectionconf]';
export const DEFAULT_CONFIG_FILENAME = 'config.ini';
export const ALLOWED_EXTS = new Set(['.ini', '.json', '.yaml', '.yml']);

export const REPORT_TTL_DEFAULT = '14d';
export const DEFAULT_PRODUCT_NAME = 'puppetdb';
export const PRODUCT_NAMES = ['puppetdb', 'pe-puppetdb'] as const;
export const DEFAULT_UPDATE_SERVER = 'https://updates.puppetlabs.com/check-for-updates';

// Sections with their own handling; everything else is passed through.
export const DATABASE_SECTION = 'database';
export const READ_DATABASE_SECTION = 'read-database';
export const COMMAND_PROCESSING_SECTION = 'command-processing';
export const PUPPETDB_SECTION = 'puppetdb';
export const DEVELOPER_SECTION = 'developer';
export const GLOBAL_SECTION = 'global';

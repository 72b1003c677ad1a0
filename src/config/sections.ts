import {
  boolean,
  days,
  defaulted,
  enumeration,
  integer,
  minutes,
  nonNegativeInteger,
  period,
  string,
  stringList,
  type Resolved,
} from '../fields/field';
import { DEFAULT_PRODUCT_NAME, DEFAULT_UPDATE_SERVER, PRODUCT_NAMES, REPORT_TTL_DEFAULT } from './constants';
import type { HostDefaults } from './host-defaults';

// Settings shared by every database connection profile, read or write.
export const DATABASE_FIELDS = {
  'conn-max-age': defaulted(minutes(), 60),
  'conn-lifetime': minutes(),
  'maximum-pool-size': defaulted(integer(), 25),
  subname: string(),
  user: string(),
  username: string(),
  password: string(),
  syntax_pgs: string(),
  'read-only?': defaulted(boolean(), 'false'),
  'partition-conn-min': defaulted(integer(), 1),
  'partition-conn-max': defaulted(integer(), 25),
  'partition-count': defaulted(integer(), 1),
  stats: defaulted(boolean(), 'true'),
  'log-statements': defaulted(boolean(), 'true'),
  'connection-timeout': defaulted(integer(), 3000),
  'facts-blacklist': stringList(),
  'facts-blacklist-type': defaulted(enumeration(['literal', 'regex']), 'literal'),
  'schema-check-interval': defaulted(integer(), 30 * 1000),
  // retired, accepted and ignored
  classname: defaulted(string(), 'org.postgresql.Driver'),
  'conn-keep-alive': minutes(),
  'log-slow-statements': days(),
  'statements-cache-size': integer(),
  subprotocol: defaulted(string(), 'postgresql'),
};

export const WRITE_DATABASE_FIELDS = {
  ...DATABASE_FIELDS,
  'migrator-username': string(),
  'migrator-password': string(),
  'gc-interval': defaulted(minutes(), 60),
  'report-ttl': defaulted(period(), REPORT_TTL_DEFAULT),
  'node-purge-ttl': defaulted(period(), '14d'),
  'node-purge-gc-batch-limit': defaulted(nonNegativeInteger(), 25),
  'node-ttl': defaulted(period(), '7d'),
  'resource-events-ttl': period(),
  migrate: defaulted(boolean(), 'true'),
};

export function commandProcessingFields(host: HostDefaults) {
  return {
    threads: defaulted(integer(), host.threads),
    'max-command-size': defaulted(integer(), host.maxCommandSize),
    'reject-large-commands': defaulted(boolean(), 'false'),
    'concurrent-writes': defaulted(integer(), host.concurrentWrites),
    // retired
    'max-frame-size': defaulted(integer(), 209715200),
    'store-usage': integer(),
    'temp-usage': integer(),
    'memory-usage': integer(),
  };
}

export const PUPPETDB_FIELDS = {
  'certificate-whitelist': string(),
  'historical-catalogs-limit': defaulted(integer(), 0),
  'disable-update-checking': defaulted(boolean(), 'false'),
  'add-agent-report-filter': defaulted(boolean(), 'true'),
};

export const DEVELOPER_FIELDS = {
  'pretty-print': defaulted(boolean(), 'false'),
  'max-enqueued': defaulted(integer(), 1000000),
};

export const GLOBAL_FIELDS = {
  vardir: string(),
  'logging-config': string(),
  'product-name': defaulted(enumeration(PRODUCT_NAMES), DEFAULT_PRODUCT_NAME),
  'update-server': defaulted(string(), DEFAULT_UPDATE_SERVER),
  // retired
  'catalog-hash-conflict-debugging': string(),
};

export type DatabaseProfile = Resolved<typeof DATABASE_FIELDS>;
export type WriteDatabaseProfile = Resolved<typeof WRITE_DATABASE_FIELDS>;
export type CommandProcessingSettings = Resolved<ReturnType<typeof commandProcessingFields>>;
export type PuppetdbSettings = Resolved<typeof PUPPETDB_FIELDS>;
export type DeveloperSettings = Resolved<typeof DEVELOPER_FIELDS>;
export type GlobalSettings = Resolved<typeof GLOBAL_FIELDS>;

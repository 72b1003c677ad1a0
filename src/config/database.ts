import { ConfigError } from '../errors/index';
import { warn } from '../output/logger';
import { convertSectionConfig, stripUnknownKeys, validateOutgoing } from '../fields/convert';
import { EMPTY_SECTION, fullMatch, type CoalescedDocument } from '../sections/coalesce';
import { formatSectionName } from '../sections/section-name';
import {
  nodeFromSection,
  sectionProfiles,
  updateSectionSettings,
  type ResolvedSection,
} from '../sections/subsections';
import type { RawSettings } from '../types/raw';
import { DATABASE_SECTION, LOG_PREFIX, READ_DATABASE_SECTION } from './constants';
import {
  DATABASE_FIELDS,
  WRITE_DATABASE_FIELDS,
  type DatabaseProfile,
  type WriteDatabaseProfile,
} from './sections';

export const DATABASE_SECTION_MATCHER = fullMatch(/database.*/);

export interface DatabaseConfig {
  readonly database: ResolvedSection<WriteDatabaseProfile>;
  readonly readDatabase: DatabaseProfile;
}

function sectionLabel(subsection: string | undefined): string {
  return formatSectionName({ section: DATABASE_SECTION, ...(subsection === undefined ? {} : { subsection }) }).slice(1, -1);
}

export function defaultEventsTtl(profile: WriteDatabaseProfile): WriteDatabaseProfile {
  if (profile['resource-events-ttl'] !== undefined) return profile;
  return { ...profile, 'resource-events-ttl': profile['report-ttl'] };
}

// Matches how the connection pool picks its login when both are configured.
export function preferUserOnUsernameMismatch(
  profile: WriteDatabaseProfile,
  subsection: string | undefined
): WriteDatabaseProfile {
  const { user, username } = profile;
  if (user !== undefined && username !== undefined && user !== username) {
    warn(
      subsection === undefined
        ? `${LOG_PREFIX} Configured database user ${JSON.stringify(user)} and username ${JSON.stringify(username)} don't match`
        : `${LOG_PREFIX} Configured ${JSON.stringify(subsection)} database user ${JSON.stringify(user)} and username ${JSON.stringify(username)} don't match`
    );
    warn(`${LOG_PREFIX} Preferring configured user ${JSON.stringify(user)}`);
  }
  const chosen = user ?? username;
  if (chosen === undefined) return profile;
  return { ...profile, user: chosen, username: chosen };
}

/**
 * Must run after preferUserOnUsernameMismatch.
 */
export function ensureMigratorInfo(profile: WriteDatabaseProfile): WriteDatabaseProfile {
  const { user, username, password } = profile;
  if (user !== username) {
    throw new ConfigError(
      `error: database user ${JSON.stringify(user)} and username ${JSON.stringify(username)} were not reconciled before the migrator defaults; please report`,
      'invariant'
    );
  }
  return {
    ...profile,
    ...(profile['migrator-username'] === undefined && user !== undefined ? { 'migrator-username': user } : {}),
    ...(profile['migrator-password'] === undefined && password !== undefined ? { 'migrator-password': password } : {}),
  };
}

/**
 * Compiles `facts-blacklist` entries when they are regular expressions. Every
 * pattern is matched against the whole fact name.
 */
export function compileFactsBlacklist(profile: DatabaseProfile): RegExp[] {
  const patterns = profile['facts-blacklist'] ?? [];
  if (profile['facts-blacklist-type'] !== 'regex') {
    return [];
  }
  const compiled: RegExp[] = [];
  const errors: string[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(`^(?:${pattern})$`));
    } catch (e: unknown) {
      errors.push(e instanceof Error ? e.message : `Invalid regular expression: ${pattern}`);
    }
  }
  if (errors.length > 0) {
    throw new ConfigError(`Unable to parse facts-blacklist patterns:\n${errors.join('\n')}`, 'conversion');
  }
  return compiled;
}

function populateDbSubsection(
  subsection: string | undefined,
  sectionwide: RawSettings | undefined,
  settings: RawSettings
): RawSettings {
  if (subsection === undefined) return settings;
  return { ...sectionwide, ...settings };
}

function fixUpDbSubsection(
  subsection: string | undefined,
  _sectionwide: WriteDatabaseProfile | undefined,
  settings: RawSettings
): WriteDatabaseProfile {
  const converted = convertSectionConfig(WRITE_DATABASE_FIELDS, settings, sectionLabel(subsection));
  const profile = ensureMigratorInfo(preferUserOnUsernameMismatch(defaultEventsTtl(converted), subsection));
  compileFactsBlacklist(profile);
  return profile;
}

export function validateDatabaseProfile(profile: WriteDatabaseProfile, subsection: string | undefined): void {
  const { subname } = profile;
  if (subname === undefined || subname.trim() === '') {
    throw new ConfigError(`No subname set in the [${sectionLabel(subsection)}] config.`, 'domain');
  }
  const eventsTtl = profile['resource-events-ttl'];
  if (eventsTtl !== undefined && eventsTtl.isLongerThan(profile['report-ttl'])) {
    throw new ConfigError(
      `The setting for resource-events-ttl must not be longer than report-ttl in the [${sectionLabel(subsection)}] config.`,
      'domain'
    );
  }
}

/**
 * The profile a read replica is derived from: the only profile, or the
 * subsection named "primary", or else the first subsection declared.
 */
export function primaryProfile(database: ResolvedSection<WriteDatabaseProfile>): WriteDatabaseProfile {
  if (database.kind === 'sectionwide') {
    return database.settings;
  }
  const named = database.subsections.get('primary');
  if (named) return named;
  const first = database.subsections.values().next();
  if (first.done === true) {
    throw new ConfigError('error: database section has no profiles; please report', 'invariant');
  }
  return first.value;
}

export function configureReadDatabase(
  database: ResolvedSection<WriteDatabaseProfile>,
  readDatabase: RawSettings | undefined
): DatabaseProfile {
  const profile =
    readDatabase === undefined
      ? validateOutgoing(
          DATABASE_FIELDS,
          { ...stripUnknownKeys(DATABASE_FIELDS, primaryProfile(database)), 'read-only?': true },
          READ_DATABASE_SECTION
        )
      : convertSectionConfig(DATABASE_FIELDS, readDatabase, READ_DATABASE_SECTION);
  const { subname } = profile;
  if (subname === undefined || subname.trim() === '') {
    throw new ConfigError(`No subname set in the [${READ_DATABASE_SECTION}] config.`, 'domain');
  }
  return profile;
}

/**
 * Resolves every `[database ...]` section into write profiles, then the read
 * replica profile.
 */
export function configureDatabase(coalesced: CoalescedDocument): DatabaseConfig {
  const node = coalesced.sections.get(DATABASE_SECTION) ?? EMPTY_SECTION;

  // Populate first so that every subsection carries the raw sectionwide values
  // before any fix-up; otherwise a sectionwide `user` produced by the fix-ups
  // would override a per-subsection `username`.
  const populated = nodeFromSection(updateSectionSettings(node, populateDbSubsection));
  const database = updateSectionSettings(populated, fixUpDbSubsection);

  for (const [subsection, profile] of sectionProfiles(database)) {
    validateDatabaseProfile(profile, subsection);
  }

  return {
    database,
    readDatabase: configureReadDatabase(database, coalesced.passthrough.get(READ_DATABASE_SECTION)),
  };
}

import path from 'path';
import { compileFactsBlacklist, primaryProfile } from './database';
import type { DatabaseProfile, WriteDatabaseProfile } from './sections';
import type { ResolvedConfig } from './types';

export function isFoss(config: ResolvedConfig): boolean {
  return config.global['product-name'] === 'puppetdb';
}

export function isPe(config: ResolvedConfig): boolean {
  return config.global['product-name'] === 'pe-puppetdb';
}

export function updateServer(config: ResolvedConfig): string {
  return config.global['update-server'];
}

/**
 * Number of command processing threads.
 */
export function mqThreadCount(config: ResolvedConfig): number {
  return config['command-processing'].threads;
}

export function rejectLargeCommands(config: ResolvedConfig): boolean {
  return config['command-processing']['reject-large-commands'];
}

export function maxCommandSize(config: ResolvedConfig): number {
  return config['command-processing']['max-command-size'];
}

export function stockpileDir(config: ResolvedConfig): string | undefined {
  const { vardir } = config.global;
  return vardir === undefined ? undefined : path.join(vardir, 'stockpile');
}

export function primaryDatabase(config: ResolvedConfig): WriteDatabaseProfile {
  return primaryProfile(config.database);
}

export function isFactBlacklisted(profile: DatabaseProfile, factName: string): boolean {
  if (profile['facts-blacklist-type'] === 'regex') {
    return compileFactsBlacklist(profile).some((re) => re.test(factName));
  }
  return (profile['facts-blacklist'] ?? []).includes(factName);
}

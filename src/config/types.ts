import type { ResolvedSection } from '../sections/subsections';
import type { RawSettings } from '../types/raw';
import type { FatalIssue } from './retirements';
import type {
  CommandProcessingSettings,
  DatabaseProfile,
  DeveloperSettings,
  GlobalSettings,
  PuppetdbSettings,
  WriteDatabaseProfile,
} from './sections';

/**
 * The fully resolved configuration. Every object in it is frozen once built;
 * the database subsection map is read-only through its type only.
 */
export interface ResolvedConfig {
  readonly global: GlobalSettings;
  readonly developer: DeveloperSettings;
  readonly database: ResolvedSection<WriteDatabaseProfile>;
  readonly 'read-database': DatabaseProfile;
  readonly 'command-processing': CommandProcessingSettings;
  readonly puppetdb: PuppetdbSettings;
  /** Sections this package does not interpret, as written. */
  readonly sections: Readonly<Record<string, RawSettings>>;
}

export type ProcessConfigResult =
  | { readonly ok: true; readonly config: ResolvedConfig }
  | { readonly ok: false; readonly fatal: readonly FatalIssue[] };

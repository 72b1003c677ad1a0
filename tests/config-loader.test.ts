import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { loadConfig, loadConfigDocument } from '../src/boundaries/config-loader';
import { validateVardir } from '../src/boundaries/vardir';
import { DEFAULT_CONFIG_FILENAME } from '../src/config/constants';
import { primaryDatabase } from '../src/config/accessors';
import { isConfigError } from '../src/errors/index';
import { catchError, TEST_HOST } from './utils';

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : '';
}

describe('Config Loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'sectionconf-loader-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads config.ini from the working directory by default', () => {
    writeFileSync(
      path.join(tempDir, DEFAULT_CONFIG_FILENAME),
      '[database]\nsubname = //localhost/pdb\n[database]\nuser = pdb\n'
    );

    const loaded = loadConfigDocument(tempDir);

    expect(loaded.path).toBe(path.join(tempDir, DEFAULT_CONFIG_FILENAME));
    expect(loaded.document).toEqual([
      ['database', { subname: '//localhost/pdb' }],
      ['database', { user: 'pdb' }],
    ]);
    const err = catchError(() => loadConfig(tempDir, undefined, { hostDefaults: TEST_HOST }));
    expect(isConfigError(err, 'duplicate-section')).toBe(true);
  });

  it('resolves JSON documents', () => {
    writeFileSync(
      path.join(tempDir, 'sc.json'),
      JSON.stringify({ database: { subname: '//localhost/pdb', 'maximum-pool-size': 10 } })
    );

    const result = loadConfig(tempDir, 'sc.json', { hostDefaults: TEST_HOST });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(primaryDatabase(result.config)['maximum-pool-size']).toBe(10);
    }
  });

  it('resolves YAML documents', () => {
    writeFileSync(
      path.join(tempDir, 'sc.yaml'),
      ['global:', '  vardir: /var/lib/sc', 'database "primary":', '  subname: //db1/pdb', ''].join('\n')
    );

    const result = loadConfig(tempDir, 'sc.yaml', { hostDefaults: TEST_HOST });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.config.global.vardir).toBe('/var/lib/sc');
      expect(primaryDatabase(result.config).subname).toBe('//db1/pdb');
    }
  });

  it('validates the shape of JSON and YAML documents', () => {
    writeFileSync(path.join(tempDir, 'sc.json'), JSON.stringify({ database: { subname: { nested: 1 } } }));
    const err = catchError(() => loadConfigDocument(tempDir, 'sc.json'));
    expect(isConfigError(err, 'schema')).toBe(true);
  });

  it('reports unparsable files as grammar errors', () => {
    writeFileSync(path.join(tempDir, 'sc.json'), '{ not json');
    const err = catchError(() => loadConfigDocument(tempDir, 'sc.json'));
    expect(isConfigError(err, 'grammar')).toBe(true);
    expect(messageOf(err)).toMatch(/^Failed to parse /);
  });

  it('reports a missing file', () => {
    const err = catchError(() => loadConfigDocument(tempDir));
    expect(isConfigError(err, 'environment')).toBe(true);
    expect(messageOf(err)).toBe(`Missing configuration file at ${path.join(tempDir, DEFAULT_CONFIG_FILENAME)}`);
  });

  it('rejects unsupported file types', () => {
    writeFileSync(path.join(tempDir, 'sc.toml'), '');
    const err = catchError(() => loadConfigDocument(tempDir, 'sc.toml'));
    expect(isConfigError(err, 'environment')).toBe(true);
  });
});

describe('validateVardir', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'sectionconf-vardir-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('accepts a writable directory', () => {
    expect(() => validateVardir(tempDir)).not.toThrow();
  });

  it('requires a vardir', () => {
    expect(() => validateVardir(undefined)).toThrow(
      "Required setting 'vardir' is not specified. Please set it to a writable directory."
    );
  });

  it('requires an absolute path', () => {
    expect(() => validateVardir('var/lib/sc')).toThrow('Vardir var/lib/sc must be an absolute path.');
  });

  it('requires the directory to exist', () => {
    const missing = path.join(tempDir, 'missing');
    expect(() => validateVardir(missing)).toThrow(
      `Vardir ${missing} does not exist. Please create it and ensure it is writable.`
    );
  });

  it('rejects files', () => {
    const file = path.join(tempDir, 'file');
    writeFileSync(file, '');
    const err = catchError(() => validateVardir(file));
    expect(isConfigError(err, 'environment')).toBe(true);
    expect(messageOf(err)).toBe(`Vardir ${file} is not a directory.`);
  });
});

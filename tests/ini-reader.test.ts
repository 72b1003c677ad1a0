import { describe, it, expect } from 'vitest';
import { readIniDocument } from '../src/boundaries/ini-reader';
import { isConfigError } from '../src/errors/index';
import { catchError } from './utils';

describe('readIniDocument', () => {
  it('reads sections in file order and keeps repeated headers apart', () => {
    const text = `
# comment
[global]
vardir = /var/lib/sc

[database]
subname = "//localhost:5432/pdb"
; another comment
[ database "replica" ]
user: 'ro'
read-only? = true
[database]
user = x
`;
    expect(readIniDocument(text)).toEqual([
      ['global', { vardir: '/var/lib/sc' }],
      ['database', { subname: '//localhost:5432/pdb' }],
      ['database "replica"', { user: 'ro', 'read-only?': 'true' }],
      ['database', { user: 'x' }],
    ]);
  });

  it('keeps empty values and empty sections', () => {
    expect(readIniDocument('[puppetdb]\ncertificate-whitelist =\n[developer]\r\n')).toEqual([
      ['puppetdb', { 'certificate-whitelist': '' }],
      ['developer', {}],
    ]);
  });

  it('keeps __proto__ keys as ordinary settings', () => {
    const [entry] = readIniDocument('[__proto__]\n__proto__ = x\n');
    expect(entry?.[0]).toBe('__proto__');
    expect(Object.getOwnPropertyDescriptor(entry?.[1] ?? {}, '__proto__')?.value).toBe('x');
  });

  it('reports lines it cannot read', () => {
    const err = catchError(() => readIniDocument('[global]\nvardir\n'));
    expect(isConfigError(err, 'grammar')).toBe(true);
    expect(err instanceof Error ? err.message : '').toBe('Line 2: expected "key = value" or a [section] header');
  });

  it('requires settings to sit inside a section', () => {
    expect(() => readIniDocument('a = 1\n[global]')).toThrow('Line 1: a must be inside a [section]');
  });
});

import { describe, it, expect } from 'vitest';
import { buildExportManifest, findDuplicateNames } from '../../src/module/export-manifest.js';
import type { FunctionRecord } from '../../src/module/types.js';

function record(name: string, aliases: string[] = [], isWip = false): FunctionRecord {
  return { name, filePath: `/mod/Public/${name}.ps1`, aliases, isWip };
}

describe('buildExportManifest', () => {
  it('sorts function names by code unit', () => {
    const manifest = buildExportManifest([record('get-b'), record('Set-A'), record('Get-C')]);
    expect(manifest.functions).toEqual(['Get-C', 'Set-A', 'get-b']);
  });

  it('drops WIP records and their aliases', () => {
    const manifest = buildExportManifest([record('Get-A', ['ga']), record('Old-Thing', ['ot'], true)]);
    expect(manifest).toEqual({ functions: ['Get-A'], aliases: ['ga'] });
  });

  it('de-duplicates aliases across the module', () => {
    const manifest = buildExportManifest([record('Get-A', ['x', 'x', 'b']), record('Get-B', ['b', 'a'])]);
    expect(manifest.aliases).toEqual(['a', 'b', 'x']);
  });

  it('keeps names that differ only in case', () => {
    const manifest = buildExportManifest([record('Get-a'), record('Get-A'), record('Get-A')]);
    expect(manifest.functions).toEqual(['Get-A', 'Get-a']);
  });

  it('does not depend on input order', () => {
    const records = [record('C', ['z']), record('A', ['y']), record('B', ['x'])];
    expect(buildExportManifest(records)).toEqual(buildExportManifest([...records].reverse()));
  });

  it('returns empty lists for no records', () => {
    expect(buildExportManifest([])).toEqual({ functions: [], aliases: [] });
  });
});

describe('findDuplicateNames', () => {
  it('lists names claimed more than once, ignoring WIP records', () => {
    const records = [record('B'), record('A'), record('B'), record('A', [], true), record('C')];
    expect(findDuplicateNames(records)).toEqual(['B']);
  });
});

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import { FixtureDataSource, parseFixtures } from '@/providers/fixture_provider';
import { ProviderError } from '@/providers/types';

const SAMPLE_PATH = fileURLToPath(
  new URL('../../config/fixtures/sample_metrics.json', import.meta.url)
);

describe('parseFixtures', () => {
  it('upper-cases symbols and skips malformed entries', () => {
    const entries = parseFixtures({
      'abc.ns': { metrics: { trailingPE: 12 } },
      'BAD.NS': { metrics: [1, 2, 3] },
      'NOMETRICS.NS': { profile: { name: 'No Metrics Ltd' } },
    });

    expect([...entries.keys()]).toEqual(['ABC.NS']);
    expect(entries.get('ABC.NS')).toEqual({ metrics: { trailingPE: 12 }, profile: null });
  });

  it('returns an empty map for non-object input', () => {
    expect(parseFixtures([1, 2]).size).toBe(0);
    expect(parseFixtures(null).size).toBe(0);
  });

  it('defaults the profile ticker to the symbol', () => {
    const entries = parseFixtures({
      'XYZ.BO': { metrics: {}, profile: { name: 'Xyz Ltd', industry: 'Chemicals' } },
    });

    expect(entries.get('XYZ.BO')?.profile).toEqual({
      name: 'Xyz Ltd',
      ticker: 'XYZ.BO',
      industry: 'Chemicals',
    });
  });

  it('reads the descriptive profile fields', () => {
    const entries = parseFixtures({
      'XYZ.BO': {
        metrics: {},
        profile: {
          name: 'Xyz Ltd',
          sector: 'Materials',
          city: 'Vapi',
          employees: 310,
          summary: 'Specialty dyes.',
          marketCapitalization: 'large',
        },
      },
    });

    expect(entries.get('XYZ.BO')?.profile).toEqual({
      name: 'Xyz Ltd',
      ticker: 'XYZ.BO',
      sector: 'Materials',
      city: 'Vapi',
      employees: 310,
      summary: 'Specialty dyes.',
    });
  });
});

describe('FixtureDataSource', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'fixture-source-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads the bundled sample file', async () => {
    const source = FixtureDataSource.fromFile(SAMPLE_PATH);

    expect(source.symbols()).toEqual(['STEADY.NS', 'SPARSE.NS', 'PRICEY.BO']);
    await expect(source.fetch('steady.ns')).resolves.toMatchObject({ trailingPE: 18 });
    await expect(source.getCompanyProfile('STEADY.NS')).resolves.toMatchObject({
      name: 'Steady Industries Ltd',
      sector: 'Industrials',
      employees: 4200,
    });
  });

  it('resolves relative paths against the project root', async () => {
    writeFileSync(
      join(tempDir, 'metrics.json'),
      JSON.stringify({ 'AAA.NS': { metrics: { beta: 1.1 } } })
    );

    const source = FixtureDataSource.fromFile('metrics.json', tempDir);

    await expect(source.fetch('AAA.NS')).resolves.toEqual({ beta: 1.1 });
    await expect(source.fetch('ZZZ.NS')).resolves.toBeNull();
    await expect(source.getCompanyProfile('AAA.NS')).resolves.toBeNull();
    expect(source.getRequestCount()).toBe(3);
  });

  it('raises a ProviderError for unreadable files', () => {
    writeFileSync(join(tempDir, 'broken.json'), '{ not json');

    expect(() => FixtureDataSource.fromFile('broken.json', tempDir)).toThrow(ProviderError);
    expect(() => FixtureDataSource.fromFile('missing.json', tempDir)).toThrow(
      /Cannot load fixture file/
    );
  });
});

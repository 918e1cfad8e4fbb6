/**
 * Unit tests for the carrier directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  StaticCarrierDirectory,
  loadCarrierDirectory,
  parseCarrierEntries,
} from '../../../../src/services/carriers/index.js';
import { ConfigError } from '../../../../src/utils/errors.js';

describe('StaticCarrierDirectory', () => {
  const directory = new StaticCarrierDirectory([
    { carrierId: 'verizon', gatewayDomain: 'vtext.com' },
    { carrierId: 'tmobile', gatewayDomain: 'tmomail.net' },
  ]);

  it('looks up domains by carrier', () => {
    expect(directory.domainFor('verizon')).toBe('vtext.com');
    expect(directory.domainFor('sprint')).toBeUndefined();
  });

  it('looks up carriers by exact domain', () => {
    expect(directory.carrierFor('tmomail.net')).toBe('tmobile');
    expect(directory.carrierFor('TMOMAIL.NET')).toBeUndefined();
  });

  it('lists carrier ids in file order', () => {
    expect(directory.carrierIds()).toEqual(['verizon', 'tmobile']);
  });

  it('does not share entries with the caller', () => {
    const entries = [{ carrierId: 'boost', gatewayDomain: 'smsmyboostmobile.com' }];
    const dir = new StaticCarrierDirectory(entries);
    entries[0].gatewayDomain = 'changed.example';

    expect(dir.domainFor('boost')).toBe('smsmyboostmobile.com');
    expect(Object.isFrozen(dir.entries()[0])).toBe(true);
  });
});

describe('parseCarrierEntries', () => {
  it('rejects non-arrays', () => {
    expect(() => parseCarrierEntries({ verizon: 'vtext.com' })).toThrow(ConfigError);
  });

  it('names every bad entry', () => {
    const parse = () =>
      parseCarrierEntries([
        { carrierId: '', gatewayDomain: 'vtext.com' },
        { carrierId: 'x', gatewayDomain: 'bad_domain.com' },
        { carrierId: 'y', gatewayDomain: 'ok.net' },
        { carrierId: 'y', gatewayDomain: 'other.net' },
      ]);

    expect(parse).toThrow(ConfigError);
    let problems: string[] = [];
    try {
      parse();
    } catch (err) {
      if (err instanceof ConfigError) problems = err.problems;
    }
    expect(problems).toEqual([
      'carriers[0].carrierId must be a non-empty string',
      'carriers[1].gatewayDomain must contain only letters and dots',
      'carriers[3] duplicates carrier "y"',
    ]);
  });
});

describe('loadCarrierDirectory', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-carriers-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads the bundled carrier file', () => {
    const directory = loadCarrierDirectory('./config/carriers.json');

    expect(directory.carrierIds()).toEqual([
      'verizon',
      'tmobile',
      'sprint',
      'at&t',
      'boost',
      'cricket',
      'uscellular',
    ]);
    expect(directory.domainFor('at&t')).toBe('txt.att.net');
  });

  it('picks up carriers added to a custom file', () => {
    const file = path.join(tempDir, 'carriers.json');
    fs.writeFileSync(file, JSON.stringify([{ carrierId: 'mint', gatewayDomain: 'tmomail.net' }]));

    expect(loadCarrierDirectory(file).carrierFor('tmomail.net')).toBe('mint');
  });

  it('reports a missing file as a config error', () => {
    expect(() => loadCarrierDirectory(path.join(tempDir, 'missing.json'))).toThrow(ConfigError);
  });

  it('reports invalid JSON as a config error', () => {
    const file = path.join(tempDir, 'carriers.json');
    fs.writeFileSync(file, '{ not json');

    expect(() => loadCarrierDirectory(file)).toThrow(/is not valid JSON/);
  });
});

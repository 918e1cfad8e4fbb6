/**
 * @fileoverview Carrier directory.
 *
 * Maps carrier ids to gateway domains and back. The entries come from a JSON
 * file so carriers can be added without a code change; the directory is built
 * once at startup and never mutated.
 */

import fs from 'fs';
import { ConfigError } from '../../utils/errors.js';
import type { CarrierDirectory, CarrierEntry } from './types.js';

export class StaticCarrierDirectory implements CarrierDirectory {
  private readonly byCarrier: ReadonlyMap<string, string>;
  private readonly byDomain: ReadonlyMap<string, string>;
  private readonly list: readonly CarrierEntry[];

  constructor(entries: CarrierEntry[]) {
    this.list = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
    this.byCarrier = new Map(entries.map((e) => [e.carrierId, e.gatewayDomain]));
    this.byDomain = new Map(entries.map((e) => [e.gatewayDomain, e.carrierId]));
  }

  domainFor(carrierId: string): string | undefined {
    return this.byCarrier.get(carrierId);
  }

  /** Exact, case-sensitive match on the gateway domain. */
  carrierFor(gatewayDomain: string): string | undefined {
    return this.byDomain.get(gatewayDomain);
  }

  carrierIds(): string[] {
    return this.list.map((e) => e.carrierId);
  }

  entries(): readonly CarrierEntry[] {
    return this.list;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed JSON as a list of carrier entries.
 * Throws ConfigError describing every bad entry.
 */
export function parseCarrierEntries(data: unknown, source = 'carriers'): CarrierEntry[] {
  if (!Array.isArray(data)) {
    throw new ConfigError([`${source} must be a JSON array of { carrierId, gatewayDomain }`]);
  }

  const problems: string[] = [];
  const entries: CarrierEntry[] = [];
  const seenIds = new Set<string>();
  const seenDomains = new Set<string>();

  data.forEach((item, index) => {
    if (!isRecord(item)) {
      problems.push(`${source}[${index}] must be an object`);
      return;
    }
    const { carrierId, gatewayDomain } = item;
    if (typeof carrierId !== 'string' || !carrierId.trim()) {
      problems.push(`${source}[${index}].carrierId must be a non-empty string`);
      return;
    }
    if (typeof gatewayDomain !== 'string' || !/^[A-Za-z.]+$/.test(gatewayDomain)) {
      problems.push(`${source}[${index}].gatewayDomain must contain only letters and dots`);
      return;
    }
    if (seenIds.has(carrierId)) {
      problems.push(`${source}[${index}] duplicates carrier "${carrierId}"`);
      return;
    }
    if (seenDomains.has(gatewayDomain)) {
      problems.push(`${source}[${index}] duplicates gateway domain "${gatewayDomain}"`);
      return;
    }
    seenIds.add(carrierId);
    seenDomains.add(gatewayDomain);
    entries.push({ carrierId, gatewayDomain });
  });

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return entries;
}

/** Load the directory from a JSON file on disk. */
export function loadCarrierDirectory(filePath: string): StaticCarrierDirectory {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError([`Cannot read carriers file ${filePath}: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError([`Carriers file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }

  return new StaticCarrierDirectory(parseCarrierEntries(data, filePath));
}

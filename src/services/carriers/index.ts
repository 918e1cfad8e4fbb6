/**
 * Carrier directory - gateway domain lookups.
 */

export { StaticCarrierDirectory, loadCarrierDirectory, parseCarrierEntries } from './directory.js';
export type { CarrierDirectory, CarrierEntry } from './types.js';

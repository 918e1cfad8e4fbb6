/**
 * Type definitions for the carrier directory.
 */

/** A mobile carrier and the domain of its SMS-to-email gateway. */
export interface CarrierEntry {
  carrierId: string;
  gatewayDomain: string;
}

/** Read-only lookups over the configured carriers. */
export interface CarrierDirectory {
  domainFor(carrierId: string): string | undefined;
  carrierFor(gatewayDomain: string): string | undefined;
  carrierIds(): string[];
  entries(): readonly CarrierEntry[];
}

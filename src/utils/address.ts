/**
 * Gateway Address Utilities
 *
 * Converts between carrier gateway email addresses (`5551234567@vtext.com`)
 * and (phone number, carrier) pairs. Every inbound sender passes through
 * decodeAddress() and every outbound recipient through encodeAddress(), so a
 * phone number inside the relay is always bare digits.
 */

import type { CarrierDirectory } from '../services/carriers/index.js';
import { MalformedAddressError, UnknownCarrierError, errorMessage, type Result } from './errors.js';

export interface GatewayAddress {
  phoneNumber: string;
  carrierId: string;
}

const GATEWAY_ADDRESS_PATTERN = /^\+?(\d+)@([A-Za-z.]+)$/;

/** `Some Name <addr>` → `addr`; anything else is returned trimmed. */
function unwrapAngleAddress(header: string): string {
  const trimmed = header.trim();
  const match = trimmed.match(/<([^<>]*)>\s*$/);
  return match ? match[1].trim() : trimmed;
}

/**
 * Parse a "From" address into its phone number and carrier.
 *
 * @throws MalformedAddressError when the address is not `[+]<digits>@<letters and dots>`
 * @throws UnknownCarrierError when the domain is not a known gateway (exact match)
 */
export function decodeAddress(fromHeader: string, directory: CarrierDirectory): GatewayAddress {
  const address = unwrapAngleAddress(fromHeader);
  const match = address.match(GATEWAY_ADDRESS_PATTERN);
  if (!match) {
    throw new MalformedAddressError(address);
  }

  const [, phoneNumber, domain] = match;
  const carrierId = directory.carrierFor(domain);
  if (carrierId === undefined) {
    throw new UnknownCarrierError(domain);
  }

  return { phoneNumber, carrierId };
}

/** decodeAddress without throwing. */
export function tryDecodeAddress(fromHeader: string, directory: CarrierDirectory): Result<GatewayAddress> {
  try {
    return { success: true, data: decodeAddress(fromHeader, directory) };
  } catch (err) {
    return { success: false, error: errorMessage(err) };
  }
}

/**
 * Build the gateway address for a phone number.
 *
 * @throws UnknownCarrierError when the carrier is not in the directory
 */
export function encodeAddress(phoneNumber: string, carrierId: string, directory: CarrierDirectory): string {
  const domain = directory.domainFor(carrierId);
  if (domain === undefined) {
    throw new UnknownCarrierError(carrierId);
  }
  return `${phoneNumber.trim().replace(/^\+/, '')}@${domain}`;
}

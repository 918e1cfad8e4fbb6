/**
 * Unit tests for gateway address encoding and decoding.
 */

import { describe, it, expect } from 'vitest';
import { decodeAddress, encodeAddress, tryDecodeAddress } from '../../src/utils/address.js';
import { MalformedAddressError, UnknownCarrierError } from '../../src/utils/errors.js';
import { TEST_CARRIERS } from '../helpers/fakes.js';

describe('decodeAddress', () => {
  it('drops the leading plus and resolves the carrier', () => {
    expect(decodeAddress('+15052897944@tmomail.net', TEST_CARRIERS)).toEqual({
      phoneNumber: '15052897944',
      carrierId: 'tmobile',
    });
  });

  it('accepts bare digits', () => {
    expect(decodeAddress('5551234567@vtext.com', TEST_CARRIERS)).toEqual({
      phoneNumber: '5551234567',
      carrierId: 'verizon',
    });
  });

  it('unwraps a display-name address', () => {
    expect(decodeAddress('"5551234567" <5551234567@txt.att.net>', TEST_CARRIERS)).toEqual({
      phoneNumber: '5551234567',
      carrierId: 'at&t',
    });
  });

  it('rejects a local part that is not digits', () => {
    expect(() => decodeAddress('abc@tmomail.net', TEST_CARRIERS)).toThrow(MalformedAddressError);
  });

  it('rejects strings without an @', () => {
    expect(() => decodeAddress('15052897944', TEST_CARRIERS)).toThrow(MalformedAddressError);
  });

  it('rejects domains with characters other than letters and dots', () => {
    expect(() => decodeAddress('5551234567@mail-gw.example.com', TEST_CARRIERS)).toThrow(MalformedAddressError);
  });

  it('rejects a well-formed address on an unknown domain', () => {
    expect(() => decodeAddress('5551234567@example.com', TEST_CARRIERS)).toThrow(UnknownCarrierError);
  });

  it('matches domains exactly, not by case or suffix', () => {
    expect(() => decodeAddress('5551234567@VTEXT.COM', TEST_CARRIERS)).toThrow(UnknownCarrierError);
    expect(() => decodeAddress('5551234567@mms.vtext.com', TEST_CARRIERS)).toThrow(UnknownCarrierError);
  });
});

describe('tryDecodeAddress', () => {
  it('returns a failed result instead of throwing', () => {
    expect(tryDecodeAddress('abc@tmomail.net', TEST_CARRIERS)).toEqual({
      success: false,
      error: 'Malformed gateway address: abc@tmomail.net',
    });
  });
});

describe('encodeAddress', () => {
  it('builds the gateway address', () => {
    expect(encodeAddress('5052897944', 'tmobile', TEST_CARRIERS)).toBe('5052897944@tmomail.net');
  });

  it('strips a leading plus', () => {
    expect(encodeAddress('+15052897944', 'verizon', TEST_CARRIERS)).toBe('15052897944@vtext.com');
  });

  it('rejects an unknown carrier', () => {
    expect(() => encodeAddress('5052897944', 'unknown', TEST_CARRIERS)).toThrow(UnknownCarrierError);
  });

  it('round-trips through decodeAddress for every carrier', () => {
    for (const { carrierId } of TEST_CARRIERS.entries()) {
      const address = encodeAddress('5052897944', carrierId, TEST_CARRIERS);
      expect(decodeAddress(address, TEST_CARRIERS)).toEqual({ phoneNumber: '5052897944', carrierId });
    }
  });
});

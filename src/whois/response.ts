import type { AddressRange } from './address-range.js';
import { extractFields } from './extract.js';

/**
 * Outcome of a referral-chasing lookup
 */
export interface LookupResult {
  /**
   * Servers queried, in order. The first is the bootstrap server, the last
   * produced `raw`.
   */
  readonly respondedServers: readonly string[];

  /**
   * Response text of the last server
   */
  readonly raw: string;

  /**
   * Organization holding the object, or '' when no known label was found
   */
  readonly organizationName: string;

  readonly addressRange?: AddressRange;
}

/**
 * Build the immutable result for the final hop, extracting its fields once
 */
export function createLookupResult(respondedServers: readonly string[], raw: string): LookupResult {
  const servers = Object.freeze([...respondedServers]);
  const { organizationName, addressRange } = extractFields(raw, servers);

  return Object.freeze({
    respondedServers: servers,
    raw,
    organizationName,
    ...(addressRange ? { addressRange } : {}),
  });
}

import ipaddr from 'ipaddr.js';
import { ParseError } from '../core/errors.js';

export type IPAddress = ReturnType<typeof ipaddr.parse>;

// "192.0.2.10-20": last-octet shorthand used by some registries
const LAST_OCTET_RANGE = /^(\d{1,3}\.\d{1,3}\.\d{1,3}\.)(\d{1,3})\s*-\s*(\d{1,3})$/;
const DASHED_RANGE = /^(\S+)\s*-\s*(\S+)$/;
const DOTTED_QUAD = /^\d{1,3}(?:\.\d{1,3}){3}$/;

/**
 * Dotted-quad IPv4 or any IPv6 form; rejects the short IPv4 forms ("10", "10.1")
 */
function isAddress(text: string): boolean {
  if (text.includes(':')) {
    return ipaddr.IPv6.isValid(text);
  }
  return DOTTED_QUAD.test(text) && ipaddr.IPv4.isValid(text);
}

function parseAddress(text: string, input: string): IPAddress {
  if (!isAddress(text)) {
    throw new ParseError(`Invalid IP address "${text}" in range "${input}"`, { input });
  }
  return ipaddr.parse(text);
}

function compareBytes(a: number[], b: number[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

/**
 * Apply a prefix length to an address: clear (network) or set (broadcast) the host bits
 */
function applyPrefix(bytes: number[], prefix: number, fill: boolean): number[] {
  return bytes.map((byte, index) => {
    const networkBits = Math.min(8, Math.max(0, prefix - index * 8));
    const hostMask = 0xff >> networkBits;
    return fill ? byte | hostMask : byte & ~hostMask & 0xff;
  });
}

/**
 * Length of the prefix for which [begin, end] is exactly one CIDR block, if any
 */
function blockPrefix(begin: number[], end: number[]): number | undefined {
  const bits = begin.length * 8;
  for (let prefix = 0; prefix <= bits; prefix++) {
    if (
      compareBytes(applyPrefix(begin, prefix, false), begin) === 0 &&
      compareBytes(applyPrefix(begin, prefix, true), end) === 0
    ) {
      return prefix;
    }
  }
  return undefined;
}

/**
 * Inclusive range of IP addresses of one family
 *
 * @example
 * AddressRange.parse('192.0.2.0/24').toString()              // '192.0.2.0/24'
 * AddressRange.parse('192.0.2.0 - 192.0.2.127').end.toString() // '192.0.2.127'
 * AddressRange.parse('2001:db8::/32').begin.toString()       // '2001:db8::'
 */
export class AddressRange {
  readonly begin: IPAddress;
  readonly end: IPAddress;

  constructor(begin: IPAddress, end: IPAddress) {
    if (begin.kind() !== end.kind()) {
      throw new ParseError(`Range ends belong to different families: ${begin.toString()} - ${end.toString()}`);
    }
    if (compareBytes(begin.toByteArray(), end.toByteArray()) > 0) {
      throw new ParseError(`Range begin ${begin.toString()} is after its end ${end.toString()}`);
    }
    this.begin = begin;
    this.end = end;
  }

  /**
   * Parse single-address, CIDR (prefix or IPv4 mask), dashed and last-octet shorthand notations
   *
   * @throws {ParseError}
   */
  static parse(text: string): AddressRange {
    const input = text.trim();

    const shorthand = LAST_OCTET_RANGE.exec(input);
    if (shorthand) {
      const [, head, first, last] = shorthand;
      return new AddressRange(parseAddress(head + first, input), parseAddress(head + last, input));
    }

    const dashed = DASHED_RANGE.exec(input);
    if (dashed) {
      return new AddressRange(parseAddress(dashed[1], input), parseAddress(dashed[2], input));
    }

    const slash = input.indexOf('/');
    if (slash !== -1) {
      const address = parseAddress(input.slice(0, slash), input);
      const prefix = AddressRange.parsePrefix(address, input.slice(slash + 1), input);
      const bytes = address.toByteArray();
      return new AddressRange(
        ipaddr.fromByteArray(applyPrefix(bytes, prefix, false)),
        ipaddr.fromByteArray(applyPrefix(bytes, prefix, true))
      );
    }

    const address = parseAddress(input, input);
    return new AddressRange(address, address);
  }

  /**
   * Like parse(), but returns undefined instead of throwing
   */
  static tryParse(text: string): AddressRange | undefined {
    try {
      return AddressRange.parse(text);
    } catch (error) {
      if (error instanceof ParseError) return undefined;
      throw error;
    }
  }

  private static parsePrefix(address: IPAddress, text: string, input: string): number {
    const bits = address.kind() === 'ipv4' ? 32 : 128;

    if (/^\d{1,3}$/.test(text)) {
      const prefix = Number.parseInt(text, 10);
      if (prefix <= bits) return prefix;
    } else if (address.kind() === 'ipv4' && ipaddr.IPv4.isValid(text)) {
      const prefix = ipaddr.IPv4.parse(text).prefixLengthFromSubnetMask();
      if (prefix !== null) return prefix;
    }

    throw new ParseError(`Invalid prefix "${text}" in range "${input}"`, { input });
  }

  get family(): 'ipv4' | 'ipv6' {
    return this.begin.kind();
  }

  /**
   * Whether `address` lies within the range (false for the other family)
   */
  contains(address: string): boolean {
    if (!isAddress(address)) return false;
    const candidate = ipaddr.parse(address);
    if (candidate.kind() !== this.family) return false;

    const bytes = candidate.toByteArray();
    return compareBytes(this.begin.toByteArray(), bytes) <= 0 &&
      compareBytes(bytes, this.end.toByteArray()) <= 0;
  }

  /**
   * Single address, "network/prefix" when the range is one CIDR block, else "begin - end"
   */
  toString(): string {
    const begin = this.begin.toByteArray();
    const end = this.end.toByteArray();

    if (compareBytes(begin, end) === 0) {
      return this.begin.toString();
    }

    const prefix = blockPrefix(begin, end);
    if (prefix !== undefined) {
      return `${this.begin.toString()}/${prefix}`;
    }

    return `${this.begin.toString()} - ${this.end.toString()}`;
  }

  toJSON(): { begin: string; end: string } {
    return { begin: this.begin.toString(), end: this.end.toString() };
  }
}

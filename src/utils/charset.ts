/**
 * Text codec for WHOIS exchanges
 *
 * Queries always go out as ASCII. Responses are decoded with the encoding the
 * caller names, since registries answer in their local charset (ISO-2022-JP
 * for JPNIC, KOI8-R for some Russian registrars, and so on).
 */

/**
 * Common charset aliases (maps to names TextDecoder accepts)
 */
const charsetAliases: Record<string, string> = {
  // UTF-8 variants
  'utf8': 'utf-8',
  'utf_8': 'utf-8',

  // UTF-16 variants
  'utf16': 'utf-16le',
  'utf-16': 'utf-16le',
  'utf16le': 'utf-16le',
  'utf16be': 'utf-16be',

  // ISO-8859 variants
  'latin1': 'iso-8859-1',
  'latin-1': 'iso-8859-1',
  'iso8859-1': 'iso-8859-1',
  'iso_8859-1': 'iso-8859-1',

  // Windows code pages
  'cp1252': 'windows-1252',
  'win1252': 'windows-1252',
  'cp1251': 'windows-1251',

  // ASCII
  'us-ascii': 'ascii',
  'usascii': 'ascii',

  // Japanese
  'shift-jis': 'shift_jis',
  'shiftjis': 'shift_jis',
  'sjis': 'shift_jis',
  'eucjp': 'euc-jp',
  'iso2022jp': 'iso-2022-jp',

  // Korean
  'euckr': 'euc-kr',
};

/**
 * Normalize charset name to standard form
 *
 * @example
 * normalizeCharset('UTF8') // 'utf-8'
 * normalizeCharset('US-ASCII') // 'ascii'
 */
export function normalizeCharset(charset: string): string {
  const lower = charset.toLowerCase().trim();
  return charsetAliases[lower] || lower;
}

/**
 * Check if a charset is supported by the runtime's TextDecoder
 */
export function isCharsetSupported(charset: string): boolean {
  try {
    new TextDecoder(normalizeCharset(charset));
    return true;
  } catch {
    return false;
  }
}

/**
 * Decode response bytes with the given charset
 *
 * ASCII bytes above 0x7F become '?'. Unknown charsets fall back to UTF-8;
 * invalid sequences become U+FFFD.
 */
export function decodeText(buffer: Uint8Array, charset = 'ascii'): string {
  const name = normalizeCharset(charset);

  // TextDecoder treats "ascii" as windows-1252; keep it 7-bit
  if (name === 'ascii') {
    return Array.from(buffer, (byte) => (byte < 0x80 ? String.fromCharCode(byte) : '?')).join('');
  }

  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(name);
  } catch {
    decoder = new TextDecoder('utf-8', { fatal: false });
  }
  return decoder.decode(buffer);
}

/**
 * Encode a query line as ASCII bytes, each non-ASCII code point becoming '?'
 */
export function encodeQueryLine(line: string): Buffer {
  return Buffer.from(line.replace(/[^\x00-\x7f]/gu, '?'), 'ascii');
}

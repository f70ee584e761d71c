/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CRC-32 (IEEE polynomial) over the UTF-8 bytes of a string.
 */

// Pre-computed CRC32 lookup table (IEEE polynomial)
const CRC32_TABLE = buildCRC32Table();

const encoder = new TextEncoder();

function buildCRC32Table(): Uint32Array {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let c = i;
    for (let j = 0; j < 8; j++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[i] = c >>> 0;
  }
  return table;
}

/**
 * @returns 32-bit unsigned integer hash
 */
export function crc32(text: string): number {
  const bytes = encoder.encode(text);
  let crc = 0xffffffff;
  for (let i = 0; i < bytes.length; i++) {
    crc = CRC32_TABLE[(crc ^ bytes[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/** crc32 as eight lowercase hex digits */
export function crc32Hex(text: string): string {
  return crc32(text).toString(16).padStart(8, '0');
}

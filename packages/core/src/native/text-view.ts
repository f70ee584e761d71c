/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Non-owning text: a window onto UTF-8 bytes held by someone else.
 *
 * Views created from foreign strings always go through copyOf(), which
 * stages the characters in a buffer the view allocates itself.
 */
export class TextView {
  private constructor(
    private readonly buffer: Uint8Array,
    private readonly start: number,
    readonly byteLength: number,
    /** true when the view allocated its backing buffer */
    readonly owned: boolean,
  ) {}

  /** View over existing bytes; the caller keeps them alive */
  static over(buffer: Uint8Array, start = 0, byteLength = buffer.length - start): TextView {
    if (start < 0 || byteLength < 0 || start + byteLength > buffer.length) {
      throw new RangeError(`TextView range ${start}+${byteLength} exceeds buffer of ${buffer.length} bytes`);
    }
    return new TextView(buffer, start, byteLength, false);
  }

  /** Staging copy of a string into a freshly allocated buffer */
  static copyOf(text: string): TextView {
    const bytes = encoder.encode(text);
    return new TextView(bytes, 0, bytes.length, true);
  }

  bytes(): Uint8Array {
    return this.buffer.subarray(this.start, this.start + this.byteLength);
  }

  toString(): string {
    return decoder.decode(this.bytes());
  }

  equals(other: TextView | string): boolean {
    return this.toString() === other.toString();
  }
}

/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Standard native types.
 *
 * @example
 * ```ts
 * t.vector(t.double)            // vector<double>
 * t.unique(t.string)            // unique_ptr<string>
 * t.named('geo::Meters', t.double)
 * ```
 */

import type { BitWidth, NativeType } from '../types.js';

function integer(name: string, bits: BitWidth, signed: boolean): NativeType {
  return { name, arithmetic: { floating: false, signed, bits } };
}

function floating(name: string, bits: 32 | 64): NativeType {
  return { name, arithmetic: { floating: true, signed: true, bits } };
}

const int = integer('int', 32, true);

const bool: NativeType = { name: 'bool', arithmetic: { floating: false, signed: false, bits: 8, boolean: true } };
const string: NativeType = { name: 'string', characters: { owning: true } };
const stringView: NativeType = { name: 'string_view', characters: { owning: false } };

export const t = {
  bool,
  int8: integer('int8', 8, true),
  int16: integer('int16', 16, true),
  int,
  int64: integer('int64', 64, true),
  uint8: integer('uint8', 8, false),
  uint16: integer('uint16', 16, false),
  uint: integer('unsigned int', 32, false),
  uint64: integer('uint64', 64, false),
  float: floating('float', 32),
  double: floating('double', 64),

  string,
  stringView,

  vector(element: NativeType): NativeType {
    return { name: `vector<${element.name}>`, iteration: { element, container: 'array' } };
  },

  set(element: NativeType): NativeType {
    return { name: `set<${element.name}>`, iteration: { element, container: 'set' } };
  },

  unique(element: NativeType): NativeType {
    return { name: `unique_ptr<${element.name}>`, ownership: { element, sharing: 'unique' } };
  },

  shared(element: NativeType): NativeType {
    return { name: `shared_ptr<${element.name}>`, ownership: { element, sharing: 'shared' } };
  },

  /** Enumeration stored as `underlying` (int by default) */
  enumeration(name: string, members?: Readonly<Record<string, number>>, underlying: NativeType = int): NativeType {
    return { name, enumeration: { underlying, members } };
  },

  /** Same traits, different spelling (namespaces, qualifiers, references) */
  named(spelling: string, base: NativeType): NativeType {
    return { ...base, name: spelling };
  },
};

/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Structural signatures
 *
 *   [hash:<content hash>|]class:<name>|fields:<type> <name>,…|methods:<name>,…[|statics:<name>,…]
 *
 * A signature sees names and types only. Two builds whose method bodies
 * differ produce the same signature unless a content hash is supplied.
 */

import { groupByName, type OverloadMember } from '../binder/naming.js';
import type { NativeType } from '../types.js';

export interface SignatureOptions {
  /** List every overload with its parameter types instead of one name per group */
  readonly methodParameterTypes: boolean;
  /** Externally computed hash of the class implementation */
  readonly contentHash?: string;
}

export interface SignatureSource {
  readonly name: string;
  readonly fields: readonly { readonly name: string; readonly type: NativeType }[];
  readonly methods: readonly OverloadMember[];
  readonly statics?: readonly OverloadMember[];
}

function listMembers(members: readonly OverloadMember[], withTypes: boolean): string {
  if (!withTypes) {
    return [...groupByName(members).keys()].join(',');
  }
  return members.map((member) => `${member.name}(${member.params.map((p) => p.type.name).join(',')})`).join(',');
}

export function structuralSignature(source: SignatureSource, options: SignatureOptions): string {
  const parts: string[] = [];
  if (options.contentHash) {
    parts.push(`hash:${options.contentHash}`);
  }
  parts.push(`class:${source.name}`);
  parts.push(`fields:${source.fields.map((field) => `${field.type.name} ${field.name}`).join(',')}`);
  parts.push(`methods:${listMembers(source.methods, options.methodParameterTypes)}`);
  if (source.statics && source.statics.length > 0) {
    parts.push(`statics:${listMembers(source.statics, options.methodParameterTypes)}`);
  }
  return parts.join('|');
}

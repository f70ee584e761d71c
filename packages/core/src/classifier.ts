/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Type Classifier: maps every native type onto exactly one TypeKind.
 *
 * Classification is structural: text wins over iteration (strings iterate
 * too), ownership pointers win over iteration, and a composite is a record
 * only when it carries no other trait.
 */

import { BuildError } from './errors.js';
import type { NativeType, TypeKind } from './types.js';

export function classify(type: NativeType): TypeKind {
  if (type.characters) return 'text';
  if (type.ownership) return 'ownership-pointer';
  if (type.iteration) return 'sequence';

  if (type.arithmetic && type.enumeration) {
    throw new BuildError(`type '${type.name}' is both arithmetic and an enumeration`);
  }
  if (type.arithmetic) return 'primitive';
  if (type.enumeration) return 'enumeration';
  if (type.composite) return 'record';

  throw new BuildError(`type '${type.name}' cannot be classified; it has no bindable traits`);
}

/** classify() that reports where the type was found */
export function classifyAt(type: NativeType, location: string, className?: string): TypeKind {
  try {
    return classify(type);
  } catch (error) {
    if (error instanceof BuildError) {
      throw new BuildError(`${location}: ${error.message}`, className);
    }
    throw error;
  }
}

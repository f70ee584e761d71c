/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type {
  ClassShape,
  ConstructorDescriptor,
  FieldDescriptor,
  MethodDescriptor,
  StaticMethodDescriptor,
} from '../types.js';

/**
 * Build-time queries for a class's shape. Every query returns members in
 * declaration order and returns the same answer each time it is asked.
 */
export interface Introspector {
  fieldsOf<T>(shape: ClassShape<T>): readonly FieldDescriptor<T>[];
  methodsOf<T>(shape: ClassShape<T>): readonly MethodDescriptor<T>[];
  constructorsOf<T>(shape: ClassShape<T>): readonly ConstructorDescriptor<T>[];
  staticMethodsOf(shape: ClassShape): readonly StaticMethodDescriptor[];
}

/** Reads the member tables a shape carries (see describeClass) */
export const tableIntrospector: Introspector = {
  fieldsOf: (shape) => shape.composite.fields(),
  methodsOf: (shape) => shape.members.methods,
  constructorsOf: (shape) => shape.members.constructors,
  staticMethodsOf: (shape) => shape.members.statics,
};

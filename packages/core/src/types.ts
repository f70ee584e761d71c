/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Native type model
 *
 * A NativeType is a structural description of a host type: a spelling plus
 * the traits the classifier looks at. Classification never inspects the
 * spelling, only the traits.
 */

import type { NativeArguments } from './native/arguments.js';

/** The six kinds every field, parameter and return type resolves to */
export type TypeKind =
  | 'primitive'
  | 'text'
  | 'enumeration'
  | 'sequence'
  | 'ownership-pointer'
  | 'record';

export type BitWidth = 8 | 16 | 32 | 64;

export interface ArithmeticTraits {
  readonly floating: boolean;
  readonly signed: boolean;
  readonly bits: BitWidth;
  /** Set for bool, which converts as its own case */
  readonly boolean?: boolean;
}

export interface TextTraits {
  /** false for views whose backing storage belongs to someone else */
  readonly owning: boolean;
}

export interface EnumerationTraits {
  /** Integer type the enumerators are stored as */
  readonly underlying: NativeType;
  readonly members?: Readonly<Record<string, number>>;
}

export type ContainerFlavor = 'array' | 'set';

export interface IterationTraits {
  readonly element: NativeType;
  readonly container: ContainerFlavor;
}

export type PointerSharing = 'unique' | 'shared';

export interface OwnershipTraits {
  readonly element: NativeType;
  readonly sharing: PointerSharing;
}

export interface CompositeTraits<T = unknown> {
  /** Ordered field table, resolved lazily so a record may refer to itself */
  fields(): readonly FieldDescriptor<T>[];
  isInstance(value: unknown): value is T;
  /** Default factory; absent when the type has no default constructor */
  readonly create?: () => T;
}

export interface NativeType {
  /** Type spelling, e.g. `int`, `geo::Point`, `vector<pair<int, float>>` */
  readonly name: string;
  readonly arithmetic?: ArithmeticTraits;
  readonly characters?: TextTraits;
  readonly enumeration?: EnumerationTraits;
  readonly iteration?: IterationTraits;
  readonly ownership?: OwnershipTraits;
  readonly composite?: CompositeTraits;
}

// ============================================================================
// Member descriptors
// ============================================================================

export interface FieldDescriptor<T = unknown> {
  readonly name: string;
  readonly type: NativeType;
  readonly doc?: string;
  get(target: T): unknown;
  set(target: T, value: unknown): void;
}

export interface ParameterDescriptor {
  readonly type: NativeType;
  /** Used for generated declarations only */
  readonly name?: string;
}

export interface MethodDescriptor<T = unknown> {
  readonly name: string;
  readonly params: readonly ParameterDescriptor[];
  /** Absent when the method returns no value */
  readonly returns?: NativeType;
  readonly doc?: string;
  invoke(target: T, args: NativeArguments): unknown;
}

export interface StaticMethodDescriptor {
  readonly name: string;
  readonly params: readonly ParameterDescriptor[];
  readonly returns?: NativeType;
  readonly doc?: string;
  invoke(args: NativeArguments): unknown;
}

export interface ConstructorDescriptor<T = unknown> {
  readonly params: readonly ParameterDescriptor[];
  readonly doc?: string;
  create(args: NativeArguments): T;
}

export interface MemberTables<T = unknown> {
  readonly methods: readonly MethodDescriptor<T>[];
  readonly statics: readonly StaticMethodDescriptor[];
  /** Declaration order; includes the default constructor when there is one */
  readonly constructors: readonly ConstructorDescriptor<T>[];
  /** Runs when an owning wrapper is finalized */
  destroy?(native: T): void;
  readonly doc?: string;
}

/** A bindable class: a record type that also carries its member tables */
export interface ClassShape<T = unknown> extends NativeType {
  readonly composite: CompositeTraits<T>;
  readonly members: MemberTables<T>;
}

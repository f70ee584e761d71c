/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Class builder
 *
 * Describes a host class once; the resulting shape is what the binding
 * generator consumes.
 *
 * @example
 * ```ts
 * const PointShape = describeClass('Point', Point)
 *   .field('x', t.float)
 *   .field('y', t.float)
 *   .defaultConstructor()
 *   .method('distance_from_origin', { returns: t.float }, (p) => p.distanceFromOrigin())
 *   .build();
 * ```
 */

import type { NativeArguments } from '../native/arguments.js';
import type {
  ClassShape,
  ConstructorDescriptor,
  FieldDescriptor,
  MemberTables,
  MethodDescriptor,
  NativeType,
  ParameterDescriptor,
  StaticMethodDescriptor,
} from '../types.js';

export type ParameterSpec = NativeType | ParameterDescriptor;

export interface CallableSpec {
  readonly params?: readonly ParameterSpec[];
  /** Omit for methods that return no value */
  readonly returns?: NativeType;
  readonly doc?: string;
}

export interface FieldOptions<T> {
  get?(target: T): unknown;
  set?(target: T, value: unknown): void;
  readonly doc?: string;
}

function toParameter(spec: ParameterSpec): ParameterDescriptor {
  return 'type' in spec ? spec : { type: spec };
}

export class ClassBuilder<T extends object> {
  private readonly fieldTable: FieldDescriptor<T>[] = [];
  private readonly methodTable: MethodDescriptor<T>[] = [];
  private readonly staticTable: StaticMethodDescriptor[] = [];
  private readonly constructorTable: ConstructorDescriptor<T>[] = [];
  private destroyHook?: (native: T) => void;
  private factory?: () => T;
  private docText?: string;
  private sealed = false;

  /** The class as a native type; usable in member types before build() */
  readonly type: ClassShape<T>;

  constructor(
    readonly name: string,
    private readonly ctor: new (...args: never[]) => T,
  ) {
    const builder = this;
    const members: MemberTables<T> = {
      methods: this.methodTable,
      statics: this.staticTable,
      constructors: this.constructorTable,
      destroy: (native) => this.destroyHook?.(native),
      get doc() {
        return builder.docText;
      },
    };

    this.type = {
      name,
      composite: {
        fields: () => this.fieldTable,
        isInstance: (value: unknown): value is T => value instanceof ctor,
        get create() {
          return builder.factory;
        },
      },
      members,
    };
  }

  field(name: string, type: NativeType, options: FieldOptions<T> = {}): this {
    this.assertOpen();
    this.fieldTable.push({
      name,
      type,
      doc: options.doc,
      get: options.get ?? ((target) => Reflect.get(target, name)),
      set:
        options.set ??
        ((target, value) => {
          Reflect.set(target, name, value);
        }),
    });
    return this;
  }

  method(name: string, spec: CallableSpec, invoke: (target: T, args: NativeArguments) => unknown): this {
    this.assertOpen();
    this.methodTable.push({
      name,
      params: (spec.params ?? []).map(toParameter),
      returns: spec.returns,
      doc: spec.doc,
      invoke,
    });
    return this;
  }

  staticMethod(name: string, spec: CallableSpec, invoke: (args: NativeArguments) => unknown): this {
    this.assertOpen();
    this.staticTable.push({
      name,
      params: (spec.params ?? []).map(toParameter),
      returns: spec.returns,
      doc: spec.doc,
      invoke,
    });
    return this;
  }

  /** A parameterized constructor; declaration order decides between equal arities */
  constructs(params: readonly ParameterSpec[], create: (args: NativeArguments) => T, doc?: string): this {
    this.assertOpen();
    this.constructorTable.push({ params: params.map(toParameter), create, doc });
    return this;
  }

  /** The zero-argument constructor; also used to create records converted by value */
  defaultConstructor(create: () => T = () => new this.ctor(), doc?: string): this {
    this.assertOpen();
    this.factory = create;
    this.constructorTable.push({ params: [], create: () => create(), doc });
    return this;
  }

  /** Runs when an owning wrapper is finalized */
  destroy(hook: (native: T) => void): this {
    this.assertOpen();
    this.destroyHook = hook;
    return this;
  }

  doc(text: string): this {
    this.assertOpen();
    this.docText = text;
    return this;
  }

  /** Seal the description and return the shape */
  build(): ClassShape<T> {
    this.sealed = true;
    return this.type;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error(`Class description for ${this.name} is already built`);
    }
  }
}

export function describeClass<T extends object>(name: string, ctor: new (...args: never[]) => T): ClassBuilder<T> {
  return new ClassBuilder(name, ctor);
}

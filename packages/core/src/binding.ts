/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { BoundMethod, BoundStatic } from './binder/methods.js';
import type { BoundProperty } from './binder/properties.js';
import type { ConstructorResolver } from './constructors.js';
import { BuildError } from './errors.js';
import type { ClassShape } from './types.js';
import type { LifetimeManager } from './wrapper.js';

export interface ClassBindingParts<T> {
  readonly shape: ClassShape<T>;
  readonly properties: readonly BoundProperty<T>[];
  readonly methods: readonly BoundMethod<T>[];
  readonly statics: readonly BoundStatic[];
  readonly constructors: ConstructorResolver<T>;
  readonly lifetime: LifetimeManager<T>;
  readonly signature: string;
}

/**
 * Everything generated for one class. Immutable, except for the foreign
 * type, which is set once when the class is defined in a runtime.
 */
export class ClassBinding<T = unknown> {
  readonly shape: ClassShape<T>;
  readonly properties: readonly BoundProperty<T>[];
  readonly methods: readonly BoundMethod<T>[];
  readonly statics: readonly BoundStatic[];
  readonly constructors: ConstructorResolver<T>;
  readonly lifetime: LifetimeManager<T>;
  readonly signature: string;
  private foreign: unknown = undefined;

  constructor(parts: ClassBindingParts<T>) {
    this.shape = parts.shape;
    this.properties = parts.properties;
    this.methods = parts.methods;
    this.statics = parts.statics;
    this.constructors = parts.constructors;
    this.lifetime = parts.lifetime;
    this.signature = parts.signature;
  }

  get name(): string {
    return this.shape.name;
  }

  /** The foreign constructor, once defined */
  get foreignType(): unknown {
    return this.foreign;
  }

  get isDefined(): boolean {
    return this.foreign !== undefined;
  }

  setForeignType(foreignType: unknown): void {
    if (this.isDefined) {
      throw new BuildError('foreign type is already set', this.name);
    }
    this.foreign = foreignType;
  }

  /** Foreign names of instance methods, in declaration order */
  get methodNames(): string[] {
    return this.methods.map((method) => method.foreignName);
  }

  get staticNames(): string[] {
    return this.statics.map((method) => method.foreignName);
  }
}

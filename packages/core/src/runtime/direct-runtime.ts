/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Direct runtime: the "foreign" side is the host realm itself.
 *
 * Foreign values are plain values; bound classes are real classes whose
 * instances carry their wrapper in a private table. Objects are finalized
 * by a FinalizationRegistry when collected, and whatever is still alive is
 * finalized by dispose().
 */

import type { BindingRuntimeError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ForeignClassDefinition, ForeignKind, ForeignRuntime } from './contract.js';

const log = createLogger('DirectRuntime');

type Finalizer = () => void;

export class DirectRuntime implements ForeignRuntime<unknown> {
  readonly name = 'direct';
  private nextHandle = 1;
  private readonly finalizers = new Map<number, Finalizer>();
  private readonly collector = new FinalizationRegistry<number>((handle) => this.finalize(handle));
  private disposed = false;

  // ── value constructors ──────────────────────────────────────

  number(value: number): unknown {
    return value;
  }

  boolean(value: boolean): unknown {
    return value;
  }

  string(value: string): unknown {
    return value;
  }

  array(items: unknown[]): unknown {
    return items;
  }

  object(entries: ReadonlyArray<readonly [string, unknown]>): unknown {
    return Object.fromEntries(entries);
  }

  absent(): unknown {
    return undefined;
  }

  null(): unknown {
    return null;
  }

  // ── value inspectors ────────────────────────────────────────

  kindOf(value: unknown): ForeignKind {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    switch (typeof value) {
      case 'number':
        return 'number';
      case 'boolean':
        return 'boolean';
      case 'string':
        return 'string';
      case 'object':
        return 'object';
      case 'function':
        return 'function';
      case 'undefined':
        return 'undefined';
      default:
        return 'other';
    }
  }

  toNumber(value: unknown): number {
    return Number(value);
  }

  toBoolean(value: unknown): boolean {
    return value === true;
  }

  toText(value: unknown): string {
    return String(value);
  }

  arrayItems(value: unknown): unknown[] {
    return Array.isArray(value) ? Array.from<unknown>(value) : [];
  }

  property(value: unknown, key: string): unknown {
    if (typeof value !== 'object' || value === null) return undefined;
    const property: unknown = Reflect.get(value, key);
    return property;
  }

  release(): void {
    // Plain values need no release
  }

  // ── object system ───────────────────────────────────────────

  defineClass<W>(definition: ForeignClassDefinition<unknown, W>): unknown {
    const wrappers = new WeakMap<object, W>();
    const wrapperOf = (self: unknown): W | undefined =>
      typeof self === 'object' && self !== null ? wrappers.get(self) : undefined;
    const adopt = (self: object, args: unknown[]): void => {
      if (this.disposed) {
        throw new Error('DirectRuntime is disposed');
      }
      const handle = this.nextHandle++;
      const wrapper = definition.construct(args, handle);
      wrappers.set(self, wrapper);
      this.track(self, handle, () => definition.finalize(wrapper));
    };

    const bound = class {
      constructor(...args: unknown[]) {
        adopt(this, args);
      }
    };
    Object.defineProperty(bound, 'name', { value: definition.name });

    for (const property of definition.properties) {
      Object.defineProperty(bound.prototype, property.name, {
        get(this: unknown) {
          return property.get(wrapperOf(this));
        },
        set(this: unknown, value: unknown) {
          property.set(wrapperOf(this), value);
        },
        enumerable: true,
        configurable: true,
      });
    }

    for (const method of definition.methods) {
      Object.defineProperty(bound.prototype, method.name, {
        value: function (this: unknown, ...args: unknown[]) {
          return method.invoke(wrapperOf(this), args);
        },
        writable: true,
        configurable: true,
      });
    }

    for (const method of definition.statics) {
      Object.defineProperty(bound, method.name, {
        value: (...args: unknown[]) => method.invoke(args),
        writable: true,
        configurable: true,
      });
    }

    return bound;
  }

  setMember(target: unknown, name: string, value: unknown): void {
    if ((typeof target !== 'object' && typeof target !== 'function') || target === null) {
      throw new TypeError(`Cannot set '${name}' on a ${this.kindOf(target)} value`);
    }
    Object.defineProperty(target, name, { value, enumerable: true, writable: true, configurable: true });
  }

  raiseError(error: BindingRuntimeError): never {
    throw error;
  }

  // ── lifetime ────────────────────────────────────────────────

  /** Objects constructed and not yet finalized */
  get liveObjects(): number {
    return this.finalizers.size;
  }

  /** Finalize every object still alive */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const handles = [...this.finalizers.keys()];
    for (const handle of handles) {
      this.finalize(handle);
    }
    log.debug(`disposed; finalized ${handles.length} live object(s)`, undefined, { operation: 'dispose' });
  }

  private track(self: object, handle: number, finalizer: Finalizer): void {
    this.finalizers.set(handle, finalizer);
    this.collector.register(self, handle);
  }

  private finalize(handle: number): void {
    const finalizer = this.finalizers.get(handle);
    if (!finalizer) return;
    this.finalizers.delete(handle);
    finalizer();
  }
}

/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * QuickJS runtime adapter: ForeignRuntime over quickjs-emscripten handles.
 *
 * Ownership follows quickjs-emscripten: handles passed into a host function
 * are borrowed, handles returned from one are consumed by the VM. Every
 * instance of a bound class is known to the host by a numeric handle; the
 * wrapper behind it lives in a per-class map until the VM's
 * FinalizationRegistry or dispose() releases it.
 */

import type { QuickJSContext, QuickJSHandle } from 'quickjs-emscripten';
import {
  createLogger,
  type BindingRuntimeError,
  type ForeignClassDefinition,
  type ForeignKind,
  type ForeignRuntime,
} from '@classbridge/core';
import { CLASS_SHIM_CODE, OBJECT_KIND_CODE } from './class-shim.js';

const log = createLogger('QuickJS');

function thunkAt<T>(thunks: readonly T[], index: number, what: string): T {
  const thunk = thunks[index];
  if (thunk === undefined) throw new Error(`No ${what} at index ${index}`);
  return thunk;
}

export class QuickJSRuntimeAdapter implements ForeignRuntime<QuickJSHandle> {
  readonly name = 'quickjs';

  private readonly classShim: QuickJSHandle;
  private readonly objectKind: QuickJSHandle;
  /** Constructors returned by defineClass, disposed with the adapter */
  private readonly classes: QuickJSHandle[] = [];
  private readonly finalizers = new Map<number, () => void>();
  private nextHandle = 1;
  private disposed = false;

  constructor(private readonly vm: QuickJSContext) {
    this.classShim = this.evalHelper(CLASS_SHIM_CODE, 'class-shim.js');
    this.objectKind = this.evalHelper(OBJECT_KIND_CODE, 'object-kind.js');
  }

  // ── value constructors ──────────────────────────────────────

  number(value: number): QuickJSHandle {
    return this.vm.newNumber(value);
  }

  boolean(value: boolean): QuickJSHandle {
    return value ? this.vm.true : this.vm.false;
  }

  string(value: string): QuickJSHandle {
    return this.vm.newString(value);
  }

  array(items: QuickJSHandle[]): QuickJSHandle {
    const arr = this.vm.newArray();
    items.forEach((item, index) => {
      this.vm.setProp(arr, index, item);
      item.dispose();
    });
    return arr;
  }

  object(entries: ReadonlyArray<readonly [string, QuickJSHandle]>): QuickJSHandle {
    const obj = this.vm.newObject();
    for (const [key, value] of entries) {
      this.vm.setProp(obj, key, value);
      value.dispose();
    }
    return obj;
  }

  absent(): QuickJSHandle {
    return this.vm.undefined;
  }

  null(): QuickJSHandle {
    return this.vm.null;
  }

  // ── value inspectors ────────────────────────────────────────

  kindOf(value: QuickJSHandle): ForeignKind {
    switch (this.vm.typeof(value)) {
      case 'number':
        return 'number';
      case 'boolean':
        return 'boolean';
      case 'string':
        return 'string';
      case 'undefined':
        return 'undefined';
      case 'function':
        return 'function';
      case 'object':
        return this.objectKindOf(value);
      default:
        return 'other';
    }
  }

  toNumber(value: QuickJSHandle): number {
    return this.vm.getNumber(value);
  }

  toBoolean(value: QuickJSHandle): boolean {
    return this.vm.dump(value) === true;
  }

  toText(value: QuickJSHandle): string {
    return this.vm.getString(value);
  }

  arrayItems(value: QuickJSHandle): QuickJSHandle[] {
    const lengthHandle = this.vm.getProp(value, 'length');
    const length = this.vm.getNumber(lengthHandle);
    lengthHandle.dispose();

    const items: QuickJSHandle[] = [];
    for (let i = 0; i < length; i++) {
      items.push(this.vm.getProp(value, i));
    }
    return items;
  }

  property(value: QuickJSHandle, key: string): QuickJSHandle | undefined {
    const handle = this.vm.getProp(value, key);
    if (this.vm.typeof(handle) === 'undefined') {
      handle.dispose();
      return undefined;
    }
    return handle;
  }

  release(value: QuickJSHandle): void {
    if (value.alive) value.dispose();
  }

  // ── object system ───────────────────────────────────────────

  defineClass<W>(definition: ForeignClassDefinition<QuickJSHandle, W>): QuickJSHandle {
    if (this.disposed) throw new Error('QuickJSRuntimeAdapter is disposed');
    const vm = this.vm;
    const wrappers = new Map<number, W>();

    const release = (handle: number): void => {
      const wrapper = wrappers.get(handle);
      wrappers.delete(handle);
      this.finalizers.delete(handle);
      if (wrapper !== undefined) definition.finalize(wrapper);
    };

    const hostFunctions = [
      vm.newFunction('construct', (...args: QuickJSHandle[]) => {
        const handle = this.nextHandle++;
        const wrapper = definition.construct(args, handle);
        wrappers.set(handle, wrapper);
        this.finalizers.set(handle, () => release(handle));
        return vm.newNumber(handle);
      }),
      vm.newFunction('release', (handle: QuickJSHandle) => {
        release(vm.getNumber(handle));
      }),
      this.names(definition.properties),
      vm.newFunction('getField', (index: QuickJSHandle, target: QuickJSHandle) =>
        thunkAt(definition.properties, vm.getNumber(index), 'property').get(wrappers.get(vm.getNumber(target))),
      ),
      vm.newFunction('setField', (index: QuickJSHandle, target: QuickJSHandle, value: QuickJSHandle) => {
        thunkAt(definition.properties, vm.getNumber(index), 'property').set(wrappers.get(vm.getNumber(target)), value);
      }),
      this.names(definition.methods),
      vm.newFunction('callMethod', (index: QuickJSHandle, target: QuickJSHandle, ...args: QuickJSHandle[]) =>
        thunkAt(definition.methods, vm.getNumber(index), 'method').invoke(wrappers.get(vm.getNumber(target)), args),
      ),
      this.names(definition.statics),
      vm.newFunction('callStatic', (index: QuickJSHandle, ...args: QuickJSHandle[]) =>
        thunkAt(definition.statics, vm.getNumber(index), 'static method').invoke(args),
      ),
    ];
    const name = vm.newString(definition.name);

    const result = vm.callFunction(this.classShim, vm.undefined, name, ...hostFunctions);
    name.dispose();
    for (const handle of hostFunctions) handle.dispose();

    if (result.error) {
      const errorData = vm.dump(result.error);
      result.error.dispose();
      throw new Error(`Failed to define class ${definition.name}: ${describeError(errorData)}`);
    }

    this.classes.push(result.value);
    log.debug(`defined ${definition.name}`, undefined, { operation: 'defineClass', className: definition.name });
    return result.value;
  }

  setMember(target: QuickJSHandle, name: string, value: QuickJSHandle): void {
    this.vm.setProp(target, name, value);
  }

  /** Thrown host errors reach the VM with their name and message */
  raiseError(error: BindingRuntimeError): never {
    throw error;
  }

  /** Objects constructed and not yet finalized */
  get liveObjects(): number {
    return this.finalizers.size;
  }

  /** Finalize every live object and free the adapter's handles. The VM stays usable. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const pending = [...this.finalizers.values()];
    this.finalizers.clear();
    for (const finalize of pending) finalize();

    for (const handle of this.classes) handle.dispose();
    this.classes.length = 0;
    this.classShim.dispose();
    this.objectKind.dispose();
  }

  private names(thunks: ReadonlyArray<{ readonly name: string }>): QuickJSHandle {
    return this.array(thunks.map((thunk) => this.string(thunk.name)));
  }

  private objectKindOf(value: QuickJSHandle): ForeignKind {
    const result = this.vm.callFunction(this.objectKind, this.vm.undefined, value);
    if (result.error) {
      const errorData = this.vm.dump(result.error);
      result.error.dispose();
      throw new Error(`Failed to inspect value: ${describeError(errorData)}`);
    }
    const kind = this.vm.getString(result.value);
    result.value.dispose();
    if (kind === 'null') return 'null';
    if (kind === 'array') return 'array';
    return 'object';
  }

  private evalHelper(code: string, filename: string): QuickJSHandle {
    const result = this.vm.evalCode(code, filename);
    if (result.error) {
      const errorData = this.vm.dump(result.error);
      result.error.dispose();
      throw new Error(`Failed to load ${filename}: ${describeError(errorData)}`);
    }
    return result.value;
  }
}

/** Message of a dumped VM error */
export function describeError(errorData: unknown): string {
  return typeof errorData === 'object' && errorData !== null && 'message' in errorData
    ? String(errorData.message)
    : String(errorData);
}

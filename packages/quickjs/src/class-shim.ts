/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * In-VM helpers, evaluated once per context.
 *
 * Host functions created by quickjs-emscripten cannot be constructed with
 * `new` and carry no per-object state, so bound classes are assembled
 * inside the VM. Each instance stores the numeric handle the host knows
 * its wrapper by; accessors and methods pass that handle back to the host.
 */

/**
 * `(name, construct, release, fields, getField, setField, methods,
 *   callMethod, statics, callStatic) => constructor`
 */
export const CLASS_SHIM_CODE = `(function (name, construct, release, fields, getField, setField, methods, callMethod, statics, callStatic) {
  const slot = Symbol(name + ' handle');
  const registry = typeof FinalizationRegistry === 'function' ? new FinalizationRegistry(release) : null;
  const handleOf = (self) => (self !== null && typeof self === 'object' && slot in self ? self[slot] : 0);

  const Bound = function (...args) {
    if (!new.target) {
      throw new TypeError("Class constructor " + name + " cannot be invoked without 'new'");
    }
    const handle = construct(...args);
    Object.defineProperty(this, slot, { value: handle });
    if (registry) registry.register(this, handle);
  };
  Object.defineProperty(Bound, 'name', { value: name });

  fields.forEach((field, index) => {
    Object.defineProperty(Bound.prototype, field, {
      get() { return getField(index, handleOf(this)); },
      set(value) { setField(index, handleOf(this), value); },
      enumerable: true,
      configurable: true,
    });
  });
  methods.forEach((method, index) => {
    Object.defineProperty(Bound.prototype, method, {
      value: function (...args) { return callMethod(index, handleOf(this), ...args); },
      writable: true,
      configurable: true,
    });
  });
  statics.forEach((method, index) => {
    Object.defineProperty(Bound, method, {
      value: function (...args) { return callStatic(index, ...args); },
      writable: true,
      configurable: true,
    });
  });
  return Bound;
})`;

/** Distinguishes null and arrays from other objects */
export const OBJECT_KIND_CODE = `(function (value) {
  return value === null ? 'null' : Array.isArray(value) ? 'array' : 'object';
})`;

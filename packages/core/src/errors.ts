/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error taxonomy.
 *
 * BuildError is raised while bindings are generated and never reaches a
 * foreign caller. Everything extending BindingRuntimeError is raised by a
 * thunk at call time and surfaces in the foreign runtime as an ordinary
 * exception carrying the same name and message.
 */

export abstract class BindingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Classification failure, missing constructor, naming collision */
export class BuildError extends BindingError {
  constructor(
    message: string,
    public readonly className?: string,
  ) {
    super(className ? `${className}: ${message}` : message);
  }
}

export abstract class BindingRuntimeError extends BindingError {}

/** Wrong argument count for a method or constructor call */
export class ArityError extends BindingRuntimeError {
  constructor(
    public readonly callee: string,
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(`${callee} expects ${expected} argument${expected === 1 ? '' : 's'}, got ${received}`);
  }
}

/** A foreign value does not match the declared native type */
export class ConversionError extends BindingRuntimeError {
  constructor(
    public readonly target: string,
    public readonly reason: string,
  ) {
    super(`${target}: ${reason}`);
  }
}

/** No constructor accepts the supplied arguments */
export class ConstructorResolutionError extends BindingRuntimeError {
  constructor(
    public readonly className: string,
    public readonly argumentCount: number,
    public readonly reason?: string,
  ) {
    super(
      `No matching constructor for ${className} with ${argumentCount} argument${argumentCount === 1 ? '' : 's'}` +
        (reason ? ` (${reason})` : ''),
    );
  }
}

/** A thunk was invoked on a wrapper without a native object */
export class InvalidObjectError extends BindingRuntimeError {
  constructor(public readonly className: string) {
    super(`Invalid ${className} object: native instance is missing or already finalized`);
  }
}

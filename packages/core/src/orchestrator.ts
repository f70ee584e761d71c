/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Binding Orchestrator
 *
 * bind() turns a class shape into a ClassBinding: every member type is
 * classified and compiled into a codec, thunks are prepared and the
 * structural signature is computed. bindModule() then defines the classes
 * in a foreign runtime, registers them and exposes them by name.
 *
 * All of this runs once, synchronously, while the host initializes. At
 * call time only codecs, thunks, the constructor resolver and wrappers are
 * involved.
 */

import { bindMethods, bindStatics, methodThunk, staticThunk } from './binder/methods.js';
import { bindProperties, propertyThunks } from './binder/properties.js';
import { guarded } from './binder/thunks.js';
import { ClassBinding } from './binding.js';
import { ConstructorResolver } from './constructors.js';
import { CodecCompiler } from './conversion/compiler.js';
import { BuildError } from './errors.js';
import { createLogger } from './logger.js';
import { DEFAULT_BINDING_OPTIONS, type BindingOptions } from './options.js';
import { SignatureRegistry } from './registry/registry.js';
import { structuralSignature } from './registry/signature.js';
import type { ForeignClassDefinition, ForeignRuntime } from './runtime/contract.js';
import type { ClassShape } from './types.js';
import { LifetimeManager, type Wrapper } from './wrapper.js';

const log = createLogger('Orchestrator');

export interface ModuleBindingReport {
  /** Class names in binding order */
  readonly bound: string[];
  /** Classes the registry had not seen before */
  readonly added: string[];
  /** Classes whose signature differs from the registered one */
  readonly changed: string[];
}

export class BindingGenerator {
  private readonly options: Required<BindingOptions>;
  private readonly compiler = new CodecCompiler();
  private readonly bindings = new Map<ClassShape, ClassBinding>();

  constructor(
    readonly registry: SignatureRegistry = new SignatureRegistry(),
    options: BindingOptions = {},
  ) {
    this.options = { ...DEFAULT_BINDING_OPTIONS, ...options };
  }

  /** Generate (or return the existing) binding for a class */
  bind(shape: ClassShape): ClassBinding {
    const existing = this.bindings.get(shape);
    if (existing) return existing;

    try {
      const binding = this.generate(shape);
      this.bindings.set(shape, binding);
      log.debug(`generated ${shape.name}`, { signature: binding.signature }, {
        operation: 'bind',
        className: shape.name,
      });
      return binding;
    } catch (error) {
      log.error('binding generation failed', error, { operation: 'bind', className: shape.name });
      throw error;
    }
  }

  /** True when the registry has no entry for the class or a different signature */
  needsRegeneration(shape: ClassShape): boolean {
    return this.registry.needsRegeneration(shape.name, this.bind(shape).signature);
  }

  /**
   * Define classes in a runtime, register them and set each one on
   * `target` under its class name.
   */
  bindModule<V>(runtime: ForeignRuntime<V>, target: V, shapes: readonly ClassShape[]): ModuleBindingReport {
    const report: ModuleBindingReport = { bound: [], added: [], changed: [] };
    const names = new Set<string>();

    const targetKind = runtime.kindOf(target);
    if (targetKind !== 'object' && targetKind !== 'function') {
      throw new BuildError(`module target must be an object or function, got ${targetKind}`);
    }

    // Generate everything first so a build error leaves the runtime untouched
    const bindings = shapes.map((shape) => {
      if (names.has(shape.name)) {
        throw new BuildError('bound twice in the same module', shape.name);
      }
      names.add(shape.name);
      const binding = this.bind(shape);
      if (binding.isDefined) {
        throw new BuildError('is already defined in a foreign runtime by this generator', shape.name);
      }
      return binding;
    });

    for (const binding of bindings) {
      const foreignType = runtime.defineClass(this.definition(runtime, binding));
      // Nothing is recorded until the class is exposed
      runtime.setMember(target, binding.name, foreignType);
      binding.setForeignType(foreignType);

      const outcome = this.registry.register(binding.name, binding.signature, foreignType);
      if (outcome === 'new') {
        report.added.push(binding.name);
      } else if (outcome === 'changed') {
        report.changed.push(binding.name);
        log.warn('signature changed since last registration; existing objects are unaffected', {
          operation: 'bindModule',
          className: binding.name,
        });
      }
      report.bound.push(binding.name);
    }

    log.info(`bound ${report.bound.length} class(es) into ${runtime.name}`, {
      operation: 'bindModule',
      data: { ...report },
    });
    return report;
  }

  /** All bindings generated so far, in generation order */
  get generated(): ClassBinding[] {
    return [...this.bindings.values()];
  }

  private generate(shape: ClassShape): ClassBinding {
    const { introspector, overloadNaming } = this.options;
    const className = shape.name;

    const fields = introspector.fieldsOf(shape);
    const methods = introspector.methodsOf(shape);
    const statics = introspector.staticMethodsOf(shape);

    const properties = bindProperties(fields, this.compiler, className);
    const fieldNames = new Map(fields.map((field) => [field.name, `field '${field.name}'`]));
    const boundMethods = bindMethods(methods, this.compiler, overloadNaming, className, fieldNames);
    const boundStatics = bindStatics(statics, this.compiler, overloadNaming, className);

    const tables = shape.members;
    const lifetime = new LifetimeManager<unknown>(
      className,
      tables.destroy ? (native) => tables.destroy?.(native) : undefined,
    );
    const constructors = ConstructorResolver.compile(
      className,
      introspector.constructorsOf(shape),
      this.compiler,
      lifetime,
    );

    const signature = structuralSignature(
      { name: className, fields, methods, statics },
      {
        methodParameterTypes: this.options.methodParameterTypes,
        contentHash: this.options.contentHashes[className],
      },
    );

    return new ClassBinding({
      shape,
      properties,
      methods: boundMethods,
      statics: boundStatics,
      constructors,
      lifetime,
      signature,
    });
  }

  private definition<V>(runtime: ForeignRuntime<V>, binding: ClassBinding): ForeignClassDefinition<V, Wrapper> {
    const className = binding.name;
    return {
      name: className,
      construct: (args, handle) => guarded(runtime, () => binding.constructors.construct(runtime, args, handle)),
      finalize: (wrapper) => binding.lifetime.finalize(wrapper),
      properties: binding.properties.map((property) => propertyThunks(runtime, className, property)),
      methods: binding.methods.map((method) => methodThunk(runtime, className, method)),
      statics: binding.statics.map((method) => staticThunk(runtime, className, method)),
    };
  }
}

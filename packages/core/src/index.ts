/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @classbridge/core
 *
 * Generates foreign-runtime bindings for host classes.
 *
 * @example
 * ```ts
 * import { BindingGenerator, DirectRuntime, describeClass, t } from '@classbridge/core';
 *
 * const shape = describeClass('Point', Point)
 *   .field('x', t.float)
 *   .field('y', t.float)
 *   .defaultConstructor()
 *   .build();
 *
 * const runtime = new DirectRuntime();
 * const module: Record<string, unknown> = {};
 * new BindingGenerator().bindModule(runtime, module, [shape]);
 * ```
 */

// Errors
export {
  BindingError,
  BuildError,
  BindingRuntimeError,
  ArityError,
  ConversionError,
  ConstructorResolutionError,
  InvalidObjectError,
} from './errors.js';

// Logging
export { createLogger, type Logger, type LogContext, type LogLevel } from './logger.js';

// Native type model
export type {
  TypeKind,
  BitWidth,
  ArithmeticTraits,
  TextTraits,
  EnumerationTraits,
  ContainerFlavor,
  IterationTraits,
  PointerSharing,
  OwnershipTraits,
  CompositeTraits,
  NativeType,
  FieldDescriptor,
  ParameterDescriptor,
  MethodDescriptor,
  StaticMethodDescriptor,
  ConstructorDescriptor,
  MemberTables,
  ClassShape,
} from './types.js';
export { t } from './native/standard-types.js';
export { TextView } from './native/text-view.js';
export { OwningPointer, UniquePointer, SharedPointer, isOwningPointer } from './native/pointers.js';
export { NativeArguments } from './native/arguments.js';

// Introspection
export { tableIntrospector, type Introspector } from './introspection/contract.js';
export {
  describeClass,
  ClassBuilder,
  type CallableSpec,
  type FieldOptions,
  type ParameterSpec,
} from './introspection/builder.js';

// Engine
export { classify, classifyAt } from './classifier.js';
export {
  CodecCompiler,
  PrimitiveCodec,
  TextCodec,
  EnumerationCodec,
  SequenceCodec,
  PointerCodec,
  RecordCodec,
  narrowInteger,
  converted,
  rejected,
  type Conversion,
  type ValueCodec,
} from './conversion/index.js';
export { Wrapper, LifetimeManager, type WrapperState } from './wrapper.js';
export {
  typeSuffixNaming,
  typeToken,
  groupByName,
  assignForeignNames,
  type OverloadMember,
  type OverloadNamingStrategy,
} from './binder/naming.js';
export type { BoundProperty } from './binder/properties.js';
export type { BoundCallable, BoundMethod, BoundStatic } from './binder/methods.js';
export { ConstructorResolver, type BoundConstructor } from './constructors.js';
export { ClassBinding } from './binding.js';
export { BindingGenerator, type ModuleBindingReport } from './orchestrator.js';
export { DEFAULT_BINDING_OPTIONS, type BindingOptions } from './options.js';
export { emitDeclarations, foreignTypeOf, type DeclarationOptions } from './declarations.js';

// Registry
export { crc32, crc32Hex } from './registry/crc32.js';
export { structuralSignature, type SignatureOptions, type SignatureSource } from './registry/signature.js';
export {
  SignatureRegistry,
  type ClassMetadata,
  type RegistrationOutcome,
  type RegistrySnapshot,
} from './registry/registry.js';

// Runtimes
export type {
  ForeignKind,
  ForeignRuntime,
  ForeignClassDefinition,
  ForeignPropertyThunks,
  ForeignMethodThunk,
  ForeignStaticThunk,
} from './runtime/contract.js';
export { DirectRuntime } from './runtime/direct-runtime.js';

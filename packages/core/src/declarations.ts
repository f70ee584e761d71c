/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Declaration emitter
 *
 * Renders bound classes as TypeScript declarations for foreign-side
 * scripts, using the generated (mangled) member names.
 */

import type { ClassBinding } from './binding.js';
import type { ValueCodec } from './conversion/codec.js';
import type { NativeType, ParameterDescriptor } from './types.js';

export interface DeclarationOptions {
  /** Wrap the classes in `declare namespace <name>` instead of declaring globals */
  namespace?: string;
  /** Leading comment lines (without comment markers) */
  header?: readonly string[];
}

/** Foreign-side TypeScript type of a native type */
export function foreignTypeOf(type: NativeType, visiting: ReadonlySet<NativeType> = new Set()): string {
  if (type.characters) return 'string';
  if (type.ownership) return `${foreignTypeOf(type.ownership.element, visiting)} | null`;
  if (type.iteration) {
    const element = foreignTypeOf(type.iteration.element, visiting);
    return element.includes(' ') ? `Array<${element}>` : `${element}[]`;
  }
  if (type.arithmetic) return type.arithmetic.boolean ? 'boolean' : 'number';
  if (type.enumeration) return 'number';
  if (type.composite) {
    if (visiting.has(type)) return 'object';
    const inner = new Set(visiting).add(type);
    const fields = type.composite.fields().map((field) => `${field.name}: ${foreignTypeOf(field.type, inner)}`);
    return `{ ${fields.join('; ')} }`;
  }
  return 'unknown';
}

function parameterList(params: readonly ParameterDescriptor[]): string {
  return params.map((param, index) => `${param.name ?? `arg${index}`}: ${foreignTypeOf(param.type)}`).join(', ');
}

function returnType(codec: ValueCodec | undefined): string {
  return codec ? foreignTypeOf(codec.type) : 'void';
}

function docLine(indent: string, doc: string | undefined): string[] {
  return doc ? [`${indent}/** ${doc} */`] : [];
}

function classLines(binding: ClassBinding, indent: string, keyword: string): string[] {
  const inner = `${indent}  `;
  const lines: string[] = [...docLine(indent, binding.shape.members.doc), `${indent}${keyword}class ${binding.name} {`];

  if (binding.constructors.defaultConstructor) {
    lines.push(...docLine(inner, binding.constructors.defaultConstructor.doc), `${inner}constructor();`);
  }
  for (const overload of binding.constructors.overloads) {
    lines.push(...docLine(inner, overload.descriptor.doc), `${inner}constructor(${parameterList(overload.descriptor.params)});`);
  }

  for (const property of binding.properties) {
    const { descriptor } = property;
    lines.push(...docLine(inner, descriptor.doc), `${inner}${descriptor.name}: ${foreignTypeOf(descriptor.type)};`);
  }

  for (const method of binding.methods) {
    lines.push(
      ...docLine(inner, method.descriptor.doc),
      `${inner}${method.foreignName}(${parameterList(method.descriptor.params)}): ${returnType(method.returns)};`,
    );
  }

  for (const method of binding.statics) {
    lines.push(
      ...docLine(inner, method.descriptor.doc),
      `${inner}static ${method.foreignName}(${parameterList(method.descriptor.params)}): ${returnType(method.returns)};`,
    );
  }

  lines.push(`${indent}}`);
  return lines;
}

export function emitDeclarations(bindings: readonly ClassBinding[], options: DeclarationOptions = {}): string {
  const lines: string[] = [];
  if (options.header && options.header.length > 0) {
    lines.push('/**', ...options.header.map((line) => (line ? ` * ${line}` : ' *')), ' */', '');
  }

  if (options.namespace) {
    lines.push(`declare namespace ${options.namespace} {`);
    bindings.forEach((binding, index) => {
      if (index > 0) lines.push('');
      lines.push(...classLines(binding, '  ', ''));
    });
    lines.push('}');
  } else {
    bindings.forEach((binding, index) => {
      if (index > 0) lines.push('');
      lines.push(...classLines(binding, '', 'declare '));
    });
  }

  lines.push('');
  return lines.join('\n');
}

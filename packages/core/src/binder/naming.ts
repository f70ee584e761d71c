/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Overload disambiguation.
 *
 * Foreign runtimes have no method overloading, so every member of an
 * overload group gets its own foreign name. Foreign call sites use those
 * names directly; a strategy must return the same names for the same
 * parameter type lists on every run.
 */

import { BuildError } from '../errors.js';
import type { ParameterDescriptor } from '../types.js';

export interface OverloadMember {
  readonly name: string;
  readonly params: readonly ParameterDescriptor[];
}

export interface OverloadNamingStrategy {
  readonly id: string;
  /** Foreign names for the members of one group, in member order */
  nameGroup(name: string, members: readonly OverloadMember[]): string[];
}

/**
 * Simplified type spelling used as a name suffix.
 *
 * @example
 * typeToken('const std::string&')         // 'string'
 * typeToken('std::map<int, geo::Point>')  // 'map_int_Point'
 * typeToken('int[3]')                     // 'int_3'
 */
export function typeToken(spelling: string): string {
  return spelling
    .replace(/\b(?:const|volatile)\b/g, ' ')
    .replace(/[&*]/g, ' ')
    .replace(/(^|[^\w\s])\s*::\s*/g, '$1')
    .replace(/[A-Za-z_]\w*\s*(?:::|\.)\s*/g, '')
    .replace(/[<>,]/g, '_')
    .replace(/\s+/g, '')
    .replace(/\W/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/** `name` for a lone member, `name_<token>_<token>…` inside a group */
export const typeSuffixNaming: OverloadNamingStrategy = {
  id: 'type-suffix',
  nameGroup(name, members) {
    if (members.length === 1) return [name];
    return members.map((member) =>
      member.params.length === 0 ? name : `${name}_${member.params.map((p) => typeToken(p.type.name)).join('_')}`,
    );
  },
};

/** Group members by name, keeping first-declaration order of groups and members */
export function groupByName<M extends OverloadMember>(members: readonly M[]): Map<string, M[]> {
  const groups = new Map<string, M[]>();
  for (const member of members) {
    const group = groups.get(member.name);
    if (group) {
      group.push(member);
    } else {
      groups.set(member.name, [member]);
    }
  }
  return groups;
}

export interface NamedMember<M> {
  readonly member: M;
  readonly foreignName: string;
}

/**
 * Assign a foreign name to every member. Results follow declaration order.
 * Two members ending up with the same foreign name is a build error.
 */
export function assignForeignNames<M extends OverloadMember>(
  members: readonly M[],
  strategy: OverloadNamingStrategy,
  className: string,
  reserved: ReadonlyMap<string, string> = new Map(),
): NamedMember<M>[] {
  const names = new Map<M, string>();
  for (const [name, group] of groupByName(members)) {
    const foreignNames = strategy.nameGroup(name, group);
    if (foreignNames.length !== group.length) {
      throw new BuildError(
        `naming strategy '${strategy.id}' returned ${foreignNames.length} names for ${group.length} overloads of '${name}'`,
        className,
      );
    }
    group.forEach((member, index) => names.set(member, foreignNames[index]));
  }

  const taken = new Map(reserved);
  return members.map((member) => {
    const foreignName = names.get(member) ?? member.name;
    const owner = taken.get(foreignName);
    if (owner !== undefined) {
      throw new BuildError(`foreign name '${foreignName}' of ${describe(member)} collides with ${owner}`, className);
    }
    taken.set(foreignName, describe(member));
    return { member, foreignName };
  });
}

function describe(member: OverloadMember): string {
  return `${member.name}(${member.params.map((p) => p.type.name).join(', ')})`;
}

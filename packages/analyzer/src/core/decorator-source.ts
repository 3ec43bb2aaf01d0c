/* DecoratorSource
 *
 * Default ReflectiveSource: answers structural queries from the metadata
 * recorded by @Attach/@Prop/@Method/@Constant/@Param/@Implements in the
 * StaticMarkerRegistry, plus the runtime prototype chain for ancestry.
 *
 * Notes:
 *  - Members of ancestors are members of the subclass. A name declared on
 *    the subclass shadows the ancestor's declaration.
 *  - Contract order: for the structure, then each ancestor, every direct
 *    contract followed by its own contracts and base classes, depth-first,
 *    first occurrence wins.
 */

import { StaticMarkerRegistry, type MemberRecord } from '../registry/index.js';
import type {
  AttachedMarker,
  MarkerTarget,
  MarkerType,
  MemberDescriptor,
  MemberKind,
  ParameterDescriptor,
  ReflectiveSource,
  Structure,
} from '../types/types.js';
import { ancestorsOf, structureName } from './structure.js';

const EMPTY: readonly never[] = Object.freeze([]);

export class DecoratorSource implements ReflectiveSource {
  constructor(private readonly registry: typeof StaticMarkerRegistry = StaticMarkerRegistry) {}

  nameOf(structure: Structure): string {
    return structureName(structure);
  }

  ancestors(structure: Structure): readonly Structure[] {
    return ancestorsOf(structure);
  }

  implementedContracts(structure: Structure): readonly Structure[] {
    const seen = new Set<Structure>();
    const visit = (subject: Structure): void => {
      for (const contract of this.registry.structureRecord(subject)?.contracts ?? EMPTY) {
        if (seen.has(contract)) continue;
        seen.add(contract);
        visit(contract);
        for (const base of ancestorsOf(contract)) {
          if (seen.has(base)) continue;
          seen.add(base);
          visit(base);
        }
      }
    };
    for (const subject of [structure, ...ancestorsOf(structure)]) visit(subject);
    return [...seen];
  }

  attachedMarkers(target: MarkerTarget, type: MarkerType): readonly AttachedMarker[] {
    const markers = this.markersAt(target);
    return markers.filter((m) => this.registry.isSubtype(m.type, type));
  }

  members(structure: Structure, kind: MemberKind): readonly MemberDescriptor[] {
    const seen = new Set<string>();
    const result: MemberDescriptor[] = [];
    for (const owner of [structure, ...ancestorsOf(structure)]) {
      const record = this.registry.structureRecord(owner);
      if (!record) continue;
      for (const member of record.members.values()) {
        if (seen.has(member.name)) continue;
        seen.add(member.name);
        if (member.kind !== kind) continue;
        result.push({
          kind,
          name: member.name,
          owner,
          isStatic: member.isStatic,
          declaredType: member.type?.(),
        });
      }
    }
    return result;
  }

  parameters(structure: Structure, method: string): readonly ParameterDescriptor[] {
    const found = this.findMember(structure, method);
    if (!found) return EMPTY;
    const [owner, member] = found;
    return [...member.parameters.values()]
      .sort((a, b) => a.position - b.position)
      .map((param) => ({
        kind: 'parameter' as const,
        name: param.name ?? `arg${param.position}`,
        owner,
        method,
        position: param.position,
        declaredType: param.type?.(),
      }));
  }

  // ---- internals ----

  /**
   * First declaration of a member along the structure's own chain.
   */
  private findMember(structure: Structure, name: string): [Structure, MemberRecord] | undefined {
    for (const owner of [structure, ...ancestorsOf(structure)]) {
      const member = this.registry.structureRecord(owner)?.members.get(name);
      if (member) return [owner, member];
    }
    return undefined;
  }

  private markersAt(target: MarkerTarget): readonly AttachedMarker[] {
    const record = this.registry.structureRecord(target.structure);
    if (!record) return EMPTY;
    switch (target.kind) {
      case 'class':
        return record.markers;
      case 'parameter': {
        const member = record.members.get(target.method);
        if (!member) return EMPTY;
        for (const param of member.parameters.values()) {
          if ((param.name ?? `arg${param.position}`) === target.name) return param.markers;
        }
        return EMPTY;
      }
      default: {
        const member = record.members.get(target.name);
        return member && member.kind === target.kind ? member.markers : EMPTY;
      }
    }
  }
}

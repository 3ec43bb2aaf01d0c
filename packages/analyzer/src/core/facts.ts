import type {
  ClassFacts,
  ComponentDescriptor,
  MarkerTarget,
  MemberFacts,
  ParameterFacts,
  ReflectiveSource,
  Structure,
} from '../types/types.js';

/*
 * Facts are frozen plain-data copies of what the source reports. Markers
 * never see a constructor or a source handle, which keeps a resolved marker
 * independent of the source it came from.
 */

export function classFacts(source: ReflectiveSource, structure: Structure): ClassFacts {
  return Object.freeze({
    kind: 'class' as const,
    name: source.nameOf(structure),
    ancestors: Object.freeze(source.ancestors(structure).map((s) => source.nameOf(s))),
    contracts: Object.freeze(source.implementedContracts(structure).map((s) => source.nameOf(s))),
  });
}

export function componentFacts(
  source: ReflectiveSource,
  descriptor: ComponentDescriptor
): MemberFacts | ParameterFacts {
  const typeName = descriptor.declaredType ? source.nameOf(descriptor.declaredType) : undefined;
  const owner = source.nameOf(descriptor.owner);
  if (descriptor.kind === 'parameter') {
    return Object.freeze({
      kind: 'parameter' as const,
      name: descriptor.name,
      owner,
      method: descriptor.method,
      position: descriptor.position,
      typeName,
    });
  }
  return Object.freeze({
    kind: descriptor.kind,
    name: descriptor.name,
    owner,
    isStatic: descriptor.isStatic,
    typeName,
  });
}

export function targetOf(descriptor: ComponentDescriptor): MarkerTarget {
  if (descriptor.kind === 'parameter') {
    return {
      kind: 'parameter',
      structure: descriptor.owner,
      method: descriptor.method,
      name: descriptor.name,
    };
  }
  return { kind: descriptor.kind, structure: descriptor.owner, name: descriptor.name };
}

/**
 * Human-readable location of a target, used in error messages.
 *
 * Point, Point.x, Point.move(), Point.move(dx)
 */
export function describeTarget(source: ReflectiveSource, target: MarkerTarget): string {
  const owner = source.nameOf(target.structure);
  switch (target.kind) {
    case 'class':
      return owner;
    case 'method':
      return `${owner}.${target.name}()`;
    case 'parameter':
      return `${owner}.${target.method}(${target.name})`;
    default:
      return `${owner}.${target.name}`;
  }
}

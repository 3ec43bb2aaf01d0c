/*
 * Marker Flag System
 * ------------------
 * Compact bit flags stored in MarkerDefinition.flags. They are computed once
 * per marker type when its definition is built, so dispatch during analysis
 * is a single bitwise AND instead of a prototype probe.
 *
 * Memory layout (32-bit integer):
 *   Bits 0-9:   Method capabilities (detected from the prototype)
 *   Bits 10-12: Declared behavior (from @Marker() options)
 *   Bits 13-31: Reserved
 */

import type { Capability, CapabilityMap } from '../types/capabilities.js';
import type { MarkerDefinition, MarkerOptions } from '../types/types.js';

export const CAP_REFLECTABLE = 1 << 0;
export const CAP_SUB_MARKERS = 1 << 1;
export const CAP_PARSES_PROPERTIES = 1 << 2;
export const CAP_PARSES_METHODS = 1 << 3;
export const CAP_PARSES_CONSTANTS = 1 << 4;
export const CAP_PARSES_PARAMETERS = 1 << 5;
export const CAP_EXCLUDABLE = 1 << 6;
export const CAP_CUSTOM_RESOLUTION = 1 << 7;
export const CAP_READS_PARENT = 1 << 8;
export const CAP_FINALIZABLE = 1 << 9;

export const MARKER_INHERITABLE = 1 << 10;
export const MARKER_TRANSITIVE = 1 << 11;
export const MARKER_MULTIPLE = 1 << 12;

/**
 * Capability name → bit. Used by `supports()`.
 */
export const CAPABILITY_FLAGS: Readonly<Record<Capability, number>> = {
  reflectable: CAP_REFLECTABLE,
  subMarkers: CAP_SUB_MARKERS,
  parsesProperties: CAP_PARSES_PROPERTIES,
  parsesMethods: CAP_PARSES_METHODS,
  parsesConstants: CAP_PARSES_CONSTANTS,
  parsesParameters: CAP_PARSES_PARAMETERS,
  excludable: CAP_EXCLUDABLE,
  customResolution: CAP_CUSTOM_RESOLUTION,
  readsParent: CAP_READS_PARENT,
  finalizable: CAP_FINALIZABLE,
};

/**
 * Methods a prototype must expose for each capability. All of them, a
 * partial implementation does not count.
 */
const CAPABILITY_METHODS: Readonly<Record<Capability, readonly string[]>> = {
  reflectable: ['fromReflection'],
  subMarkers: ['subMarkers'],
  parsesProperties: ['propertyMarker', 'includePropertiesByDefault', 'setProperties'],
  parsesMethods: ['methodMarker', 'includeMethodsByDefault', 'setMethods'],
  parsesConstants: ['constantMarker', 'includeConstantsByDefault', 'setConstants'],
  parsesParameters: ['parameterMarker', 'includeParametersByDefault', 'setParameters'],
  excludable: ['exclude'],
  customResolution: ['customResolve'],
  readsParent: ['fromParent'],
  finalizable: ['finalize'],
};

const CAPABILITIES: readonly Capability[] = [
  'reflectable',
  'subMarkers',
  'parsesProperties',
  'parsesMethods',
  'parsesConstants',
  'parsesParameters',
  'excludable',
  'customResolution',
  'readsParent',
  'finalizable',
];

/**
 * Probe a marker prototype (and its chain) for capability methods.
 */
export function detectCapabilities(prototype: object): number {
  let flags = 0;
  for (const capability of CAPABILITIES) {
    const methods = CAPABILITY_METHODS[capability];
    if (methods.every((m) => typeof Reflect.get(prototype, m) === 'function')) {
      flags |= CAPABILITY_FLAGS[capability];
    }
  }
  return flags;
}

/**
 * Convert `@Marker()` options to their flag bits.
 */
export function optionsToFlags(options: MarkerOptions): number {
  let flags = 0;
  if (options.inheritable) flags |= MARKER_INHERITABLE;
  if (options.transitive) flags |= MARKER_TRANSITIVE;
  if (options.multiple) flags |= MARKER_MULTIPLE;
  return flags;
}

export function hasFlag(definition: MarkerDefinition, flag: number): boolean {
  return (definition.flags & flag) !== 0;
}

/**
 * Narrow a marker to a capability contract using its definition's flags.
 *
 * @param definition - Definition of the marker's own (runtime) type
 * @param marker - The marker instance being resolved
 * @param capability - Capability to test
 */
export function supports<K extends Capability>(
  definition: MarkerDefinition,
  marker: object,
  capability: K
): marker is CapabilityMap[K] {
  return (definition.flags & CAPABILITY_FLAGS[capability]) !== 0;
}

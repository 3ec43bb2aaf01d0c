import type { ClassAnalyzer, MarkerType, SubjectFacts } from './types.js';

/*
 * Capability contracts
 * --------------------
 * A marker opts into a resolution step by implementing the matching method
 * set. Detection happens once per marker type (see `StaticMarkerRegistry`),
 * the analyzer then dispatches on the cached flags.
 *
 * Inheritable, transitive and multi-value behavior carry no methods and are
 * declared through `@Marker()` options instead.
 */

/** Receives copied structural facts about the target it was resolved for. */
export interface Reflectable {
  fromReflection(facts: SubjectFacts): void;
}

/**
 * One sub-marker type folded into a main marker. Build these with
 * `subMarker()` or `subMarkers()` rather than by hand.
 */
export interface SubMarkerBinding {
  readonly type: MarkerType;
  apply(values: readonly object[]): void;
}

export interface HasSubMarkers {
  subMarkers(): readonly SubMarkerBinding[];
}

export interface ParsesProperties<P extends object = object> {
  propertyMarker(): MarkerType<P>;
  includePropertiesByDefault(): boolean;
  setProperties(properties: ReadonlyMap<string, P>): void;
}

export interface ParsesMethods<P extends object = object> {
  methodMarker(): MarkerType<P>;
  includeMethodsByDefault(): boolean;
  setMethods(methods: ReadonlyMap<string, P>): void;
}

export interface ParsesConstants<P extends object = object> {
  constantMarker(): MarkerType<P>;
  includeConstantsByDefault(): boolean;
  setConstants(constants: ReadonlyMap<string, P>): void;
}

/** Method markers only. */
export interface ParsesParameters<P extends object = object> {
  parameterMarker(): MarkerType<P>;
  includeParametersByDefault(): boolean;
  setParameters(parameters: ReadonlyMap<string, P>): void;
}

/** Child markers reporting `true` are dropped from their parent's mapping. */
export interface Excludable {
  exclude(): boolean;
}

/**
 * Receives the analyzer after every other step. Calling back into
 * `analyze()` for the same pair recurses without bound.
 */
export interface CustomResolution {
  customResolve(analyzer: ClassAnalyzer): void;
}

/** Child markers receive the marker of the structure or method owning them. */
export interface ReadsParent<P extends object = object> {
  fromParent(parent: P): void;
}

/** Last call before the marker is frozen. */
export interface Finalizable {
  finalize(): void;
}

/**
 * Capability name → contract. Keys double as names for the bit flags.
 */
export interface CapabilityMap {
  reflectable: Reflectable;
  subMarkers: HasSubMarkers;
  parsesProperties: ParsesProperties;
  parsesMethods: ParsesMethods;
  parsesConstants: ParsesConstants;
  parsesParameters: ParsesParameters;
  excludable: Excludable;
  customResolution: CustomResolution;
  readsParent: ReadsParent;
  finalizable: Finalizable;
}

export type Capability = keyof CapabilityMap;

export { Analyzer } from './core/analyzer.js';
export { MemoryCacheAnalyzer } from './core/memory-cache-analyzer.js';
export { AnalysisCache } from './core/analysis-cache.js';
export { DecoratorSource } from './core/decorator-source.js';
export { Instantiator } from './core/instantiator.js';
export type { Staged } from './core/instantiator.js';
export { Lineage } from './core/lineage.js';

export { subMarker, subMarkers } from './api/sub-markers.js';

export { Attach, Constant, Implements, Marker, Method, Param, Prop } from './decorators/index.js';
export type { AttachArgs, MarkerFieldsOf, TypedDeclaration, UniversalDecorator } from './decorators/index.js';
export { StaticMarkerRegistry } from './registry/static-registry.js';

export type {
  AnalyzerConfig,
  AttachedMarker,
  ClassAnalyzer,
  ClassFacts,
  ComponentDescriptor,
  ComponentKind,
  Constructor,
  MarkerArgs,
  MarkerDefinition,
  MarkerFields,
  MarkerOptions,
  MarkerTarget,
  MarkerType,
  MemberDescriptor,
  MemberFacts,
  MemberKind,
  ParameterDescriptor,
  ParameterFacts,
  ReflectiveSource,
  Structure,
  SubjectFacts,
} from './types/types.js';

// Capability contracts
export type {
  Capability,
  CapabilityMap,
  CustomResolution,
  Excludable,
  Finalizable,
  HasSubMarkers,
  ParsesConstants,
  ParsesMethods,
  ParsesParameters,
  ParsesProperties,
  Reflectable,
  ReadsParent,
  SubMarkerBinding,
} from './types/capabilities.js';

// Errors
export {
  AmbiguousAttachmentError,
  InvalidDecoratorTargetError,
  InvalidMarkerArgumentsError,
  InvalidSubjectError,
  MissingRequiredArgumentsError,
  UnknownMarkerArgumentsError,
} from './errors/errors.js';

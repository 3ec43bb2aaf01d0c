import type { AnyZodObject } from 'zod';

/**
 * Generic constructor signature used for marker classes.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * A class-like structure under analysis. Abstract classes qualify, which is
 * how contracts are expressed.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Structure<T = any> = abstract new (...args: any[]) => T;

/**
 * A marker class. Its instances are the resolved marker data.
 */
export type MarkerType<M extends object = object> = Constructor<M>;

/**
 * Raw marker arguments as written at the attachment site: named fields, or
 * positional values bound to the schema's fields in declaration order.
 */
export type MarkerArgs = Readonly<Record<string, unknown>> | readonly unknown[];

/**
 * Field schema accepted by `@Marker()`.
 */
export type MarkerFields = AnyZodObject;

/**
 * Options accepted by the `@Marker()` decorator.
 */
export interface MarkerOptions {
  /** Data shape and defaults of the marker. Omitted means "no fields". */
  fields?: MarkerFields;
  /** Search ancestor classes (and contracts, at class level) when absent locally. */
  inheritable?: boolean;
  /** Follow a property's or parameter's declared type when absent locally. */
  transitive?: boolean;
  /** Permit several attachments on one target (sub-markers only). */
  multiple?: boolean;
}

/**
 * Resolved, immutable description of a marker type.
 */
export interface MarkerDefinition {
  readonly type: MarkerType;
  readonly name: string;
  readonly schema: MarkerFields;
  readonly fieldNames: readonly string[];
  /** Capability bit flags, see `core/flags.ts`. */
  readonly flags: number;
  /** The marker type and every marker class it extends. */
  readonly lineage: ReadonlySet<MarkerType>;
}

export type MemberKind = 'property' | 'method' | 'constant';
export type ComponentKind = MemberKind | 'parameter';

/**
 * Anything a marker can be attached to.
 */
export type MarkerTarget =
  | { readonly kind: 'class'; readonly structure: Structure }
  | { readonly kind: MemberKind; readonly structure: Structure; readonly name: string }
  | {
      readonly kind: 'parameter';
      readonly structure: Structure;
      readonly method: string;
      readonly name: string;
    };

export interface MemberDescriptor {
  readonly kind: MemberKind;
  readonly name: string;
  /** Declaring structure (an ancestor for inherited members). */
  readonly owner: Structure;
  readonly isStatic: boolean;
  readonly declaredType?: Structure;
}

export interface ParameterDescriptor {
  readonly kind: 'parameter';
  readonly name: string;
  readonly owner: Structure;
  readonly method: string;
  readonly position: number;
  readonly declaredType?: Structure;
}

export type ComponentDescriptor = MemberDescriptor | ParameterDescriptor;

/**
 * A marker as attached at a site, before instantiation.
 */
export interface AttachedMarker {
  readonly type: MarkerType;
  readonly args?: MarkerArgs;
}

/**
 * Read-only structural introspection consumed by the analyzer.
 */
export interface ReflectiveSource {
  nameOf(structure: Structure): string;
  /** Ancestor classes, immediate parent first. */
  ancestors(structure: Structure): readonly Structure[];
  /** Directly and transitively implemented contracts. */
  implementedContracts(structure: Structure): readonly Structure[];
  /** Markers on the target whose type is `type` or a subtype of it. */
  attachedMarkers(target: MarkerTarget, type: MarkerType): readonly AttachedMarker[];
  /** Own and inherited members of a kind, own first. */
  members(structure: Structure, kind: MemberKind): readonly MemberDescriptor[];
  /** Parameters of a method, by position. */
  parameters(structure: Structure, method: string): readonly ParameterDescriptor[];
}

export interface ClassFacts {
  readonly kind: 'class';
  readonly name: string;
  readonly ancestors: readonly string[];
  readonly contracts: readonly string[];
}

export interface MemberFacts {
  readonly kind: MemberKind;
  readonly name: string;
  readonly owner: string;
  readonly isStatic: boolean;
  readonly typeName?: string;
}

export interface ParameterFacts {
  readonly kind: 'parameter';
  readonly name: string;
  readonly owner: string;
  readonly method: string;
  readonly position: number;
  readonly typeName?: string;
}

/**
 * Structural facts copied out of the source for `fromReflection()`.
 */
export type SubjectFacts = ClassFacts | MemberFacts | ParameterFacts;

/**
 * Anything able to resolve a marker for a structure.
 */
export interface ClassAnalyzer {
  analyze<M extends object>(subject: Structure | object, type: MarkerType<M>): M;
}

/**
 * Analyzer configuration passed to the constructor.
 */
export interface AnalyzerConfig {
  /**
   * Structural introspection to resolve against.
   *
   * @default new DecoratorSource()
   */
  source?: ReflectiveSource;

  /**
   * Optional hook invoked after a marker is constructed.
   *
   * Receives the marker class name and the construction duration in
   * nanoseconds.
   */
  onInstantiate?: (marker: string, durationNs: number) => void;

  /**
   * Optional hook invoked after a top-level `analyze()` call completes.
   */
  onAnalyze?: (subject: string, marker: string, durationNs: number) => void;
}

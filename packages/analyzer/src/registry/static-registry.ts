import { z } from 'zod';

import { detectCapabilities, optionsToFlags } from '../core/flags.js';
import { isConstructor } from '../core/structure.js';
import type {
  AttachedMarker,
  MarkerDefinition,
  MarkerFields,
  MarkerOptions,
  MarkerType,
  MemberKind,
  Structure,
} from '../types/types.js';

const isProd = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

/** Schema of markers declaring no fields. */
const EMPTY_FIELDS: MarkerFields = z.object({});

/**
 * Member kinds ranked by how specific the declaration is. A member seen by
 * `@Attach` first (property) and `@Constant` later ends up a constant.
 */
const KIND_RANK: Readonly<Record<MemberKind, number>> = { property: 0, method: 1, constant: 2 };

/**
 * Decorator metadata for one method parameter.
 */
export type ParameterRecord = {
  position: number;
  name?: string;
  type?: () => Structure;
  markers: AttachedMarker[];
};

/**
 * Decorator metadata for one property, method or constant.
 */
export type MemberRecord = {
  name: string;
  kind: MemberKind;
  isStatic: boolean;
  type?: () => Structure;
  markers: AttachedMarker[];
  parameters: Map<number, ParameterRecord>;
};

/**
 * Decorator metadata for one class.
 *
 * Fields:
 * - markers: class-level attachments, in source order
 * - contracts: direct contracts from @Implements()
 * - members: property/method/constant records keyed by name, first-seen order
 */
export type StructureRecord = {
  markers: AttachedMarker[];
  contracts: Structure[];
  members: Map<string, MemberRecord>;
};

/**
 * Options for declaring a member.
 */
export type MemberDeclaration = {
  kind: MemberKind;
  isStatic: boolean;
  type?: () => Structure;
};

export type ParameterDeclaration = {
  isStatic: boolean;
  name?: string;
  type?: () => Structure;
};

/**
 * A bag of marker metadata.
 *
 * Fields:
 * - markers: @Marker() options per marker class
 * - definitions: lazily built definitions, dropped whenever @Marker() runs
 * - structures: attachments and declarations per analyzed class
 */
type GlobalBag = {
  markers: WeakMap<MarkerType, MarkerOptions>;
  definitions: WeakMap<MarkerType, MarkerDefinition>;
  structures: WeakMap<Structure, StructureRecord>;
};

/**
 * Global symbol for storing the static marker registry on globalThis.
 *
 * This ensures a single registry instance per process, even if the module
 * is bundled multiple times.
 */
const GLOBAL_SYMBOL = Symbol.for('sigil.staticMarkerRegistry');

function createBag(): GlobalBag {
  return { markers: new WeakMap(), definitions: new WeakMap(), structures: new WeakMap() };
}

function isGlobalBag(value: unknown): value is GlobalBag {
  return (
    typeof value === 'object' &&
    value !== null &&
    Reflect.get(value, 'markers') instanceof WeakMap &&
    Reflect.get(value, 'definitions') instanceof WeakMap &&
    Reflect.get(value, 'structures') instanceof WeakMap
  );
}

/**
 * Ensure the global bag exists.
 */
function ensureBag(): GlobalBag {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isGlobalBag(existing)) return existing;
  const fresh = createBag();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Marker classes from the requested type up to its root class.
 */
function markerLineage(type: MarkerType): MarkerType[] {
  const lineage: MarkerType[] = [];
  let current: unknown = type;
  while (isConstructor(current)) {
    lineage.push(current);
    current = Object.getPrototypeOf(current);
  }
  return lineage;
}

/**
 * Global registry for decorator-based marker metadata.
 *
 * Architecture:
 * - Decorators call the register/attach/declare methods at module load time
 * - DecoratorSource reads structure records during analysis
 * - Analyzer and Instantiator call definitionOf(), built lazily and cached
 */
export class StaticMarkerRegistry {
  /**
   * Register options from the @Marker() decorator.
   *
   * Cached definitions are dropped wholesale: subclasses without their own
   * @Marker() derive theirs from this one.
   */
  static registerMarker(type: MarkerType, options: MarkerOptions): void {
    const bag = this.getBag();
    bag.markers.set(type, options);
    bag.definitions = new WeakMap();
  }

  /**
   * Build (or return the cached) definition of a marker type.
   *
   * Options and fields come from the nearest class in the marker's lineage
   * decorated with @Marker(); undecorated lineages get no fields and no
   * declared behavior. Method capabilities are always probed on the type
   * itself.
   */
  static definitionOf(type: MarkerType): MarkerDefinition {
    const bag = this.getBag();
    return bag.definitions.get(type) ?? this.buildDef(type, bag);
  }

  /**
   * Whether `candidate` is `requested` or one of its subclasses.
   */
  static isSubtype(candidate: MarkerType, requested: MarkerType): boolean {
    return this.definitionOf(candidate).lineage.has(requested);
  }

  /**
   * Stacked decorators are applied bottom-up; attachments are prepended so
   * records keep source order.
   */
  static attachToClass(structure: Structure, marker: AttachedMarker): void {
    this.ensureStructure(structure).markers.unshift(marker);
  }

  static registerContracts(structure: Structure, contracts: readonly Structure[]): void {
    const rec = this.ensureStructure(structure);
    for (const contract of contracts) {
      if (!rec.contracts.includes(contract)) rec.contracts.push(contract);
    }
  }

  /**
   * Declare a member, or refine an existing declaration. The declared type
   * and static flag of a later declaration win when given.
   */
  static declareMember(structure: Structure, name: string, decl: MemberDeclaration): MemberRecord {
    const rec = this.ensureStructure(structure);
    let member = rec.members.get(name);
    if (!member) {
      member = {
        name,
        kind: decl.kind,
        isStatic: decl.isStatic,
        type: decl.type,
        markers: [],
        parameters: new Map(),
      };
      rec.members.set(name, member);
      return member;
    }
    if (KIND_RANK[decl.kind] > KIND_RANK[member.kind]) member.kind = decl.kind;
    member.isStatic = decl.isStatic;
    if (decl.type) member.type = decl.type;
    return member;
  }

  static attachToMember(
    structure: Structure,
    name: string,
    decl: MemberDeclaration,
    marker: AttachedMarker
  ): void {
    this.declareMember(structure, name, decl).markers.unshift(marker);
  }

  /**
   * Declare a method parameter. Declaring a parameter declares its method.
   */
  static declareParameter(
    structure: Structure,
    method: string,
    position: number,
    decl: ParameterDeclaration
  ): ParameterRecord {
    const member = this.declareMember(structure, method, {
      kind: 'method',
      isStatic: decl.isStatic,
    });
    let param = member.parameters.get(position);
    if (!param) {
      param = { position, name: decl.name, type: decl.type, markers: [] };
      member.parameters.set(position, param);
      return param;
    }
    if (decl.name) param.name = decl.name;
    if (decl.type) param.type = decl.type;
    return param;
  }

  static attachToParameter(
    structure: Structure,
    method: string,
    position: number,
    decl: ParameterDeclaration,
    marker: AttachedMarker
  ): void {
    this.declareParameter(structure, method, position, decl).markers.unshift(marker);
  }

  /**
   * Read the record of a structure, if any decorator touched it.
   */
  static structureRecord(structure: Structure): StructureRecord | undefined {
    return this.getBag().structures.get(structure);
  }

  /**
   * Test helper to reset the registry.
   *
   * ⚠️ For test environments only. Alias for reset().
   */
  static resetForTests(): void {
    this.reset();
  }

  static getBag(): GlobalBag {
    return ensureBag();
  }

  /**
   * Reset the registry bag.
   *
   * ⚠️ This is intended for test environments. Calling reset() in production
   * drops the metadata of every class already decorated.
   */
  static reset(): void {
    Reflect.set(globalThis, GLOBAL_SYMBOL, createBag());
  }

  // ---- internals ----

  private static ensureStructure(structure: Structure): StructureRecord {
    const bag = this.getBag();
    let rec = bag.structures.get(structure);
    if (!rec) {
      rec = { markers: [], contracts: [], members: new Map() };
      bag.structures.set(structure, rec);
    }
    return rec;
  }

  private static buildDef(type: MarkerType, bag: GlobalBag): MarkerDefinition {
    const lineage = markerLineage(type);
    let options: MarkerOptions = {};
    for (const candidate of lineage) {
      const found = bag.markers.get(candidate);
      if (found) {
        options = found;
        break;
      }
    }
    const schema = (options.fields ?? EMPTY_FIELDS).strict();
    const prototype: unknown = type.prototype;
    const capabilities =
      typeof prototype === 'object' && prototype !== null ? detectCapabilities(prototype) : 0;

    const def: MarkerDefinition = {
      type,
      name: type.name || 'AnonymousMarker',
      schema,
      fieldNames: Object.keys(schema.shape),
      flags: capabilities | optionsToFlags(options),
      lineage: new Set(lineage),
    };

    // Definitions are frozen outside production
    if (!isProd) Object.freeze(def);

    bag.definitions.set(type, def);
    return def;
  }
}

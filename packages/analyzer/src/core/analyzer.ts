/* Analyzer
 *
 * Resolves one marker type for one structure. Responsibilities:
 *  - Locate the attached marker (subtype-tolerant), widening to ancestors and
 *    contracts for inheritable types, and to the declared type of a property
 *    or parameter for transitive types.
 *  - Instantiate defaults when nothing is attached, via the Instantiator.
 *  - Populate the marker through the capabilities its type implements:
 *    reflection, parent marker, sub-markers, child components (properties,
 *    methods, constants, method parameters), custom resolution, finalize.
 *  - Freeze the marker once its pass completes.
 *
 * Resolution flow (per target):
 *  1. Base lookup, then inheritance search, then transitivity (components)
 *  2. Default instantiation when still absent (components: only when the
 *     parent includes by default)
 *  3. fromReflection(facts) with the facts of the requested target, even
 *     when the marker came from an ancestor or a typed-to class
 *  4. fromParent(parent) for components
 *  5. Sub-marker folding (local lookup, no population)
 *  6. Child components (class targets) or parameters (method targets)
 *  7. customResolve(analyzer), finalize()
 *  8. Exclusion filter (components)
 *
 * Notes:
 *  - The analyzer keeps no state between calls. Caching belongs to
 *    MemoryCacheAnalyzer.
 *  - customResolve() receives this analyzer and may call analyze() again;
 *    cycles through that hook are not detected.
 *  - Any error aborts the whole call. Nothing partially populated escapes.
 */

import { AmbiguousAttachmentError } from '../errors/errors.js';
import { StaticMarkerRegistry } from '../registry/index.js';
import type { SubMarkerBinding } from '../types/capabilities.js';
import type {
  AnalyzerConfig,
  ClassAnalyzer,
  ComponentDescriptor,
  MarkerTarget,
  MarkerType,
  ReflectiveSource,
  Structure,
  SubjectFacts,
} from '../types/types.js';
import { instrumentSync } from './clock.js';
import { DecoratorSource } from './decorator-source.js';
import { classFacts, componentFacts, describeTarget, targetOf } from './facts.js';
import { hasFlag, MARKER_INHERITABLE, MARKER_MULTIPLE, MARKER_TRANSITIVE, supports } from './flags.js';
import { Instantiator, type Staged } from './instantiator.js';
import { Lineage } from './lineage.js';
import { toStructure } from './structure.js';

const isProd = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

/**
 * The target being populated, with its facts computed once.
 */
interface Subject {
  readonly target: MarkerTarget;
  readonly facts: SubjectFacts;
  readonly label: string;
}

export class Analyzer implements ClassAnalyzer {
  readonly source: ReflectiveSource;
  private readonly instantiator: Instantiator;
  private readonly lineage: Lineage;
  private readonly registry = StaticMarkerRegistry;

  constructor(private readonly config: AnalyzerConfig = {}) {
    this.source = config.source ?? new DecoratorSource();
    this.instantiator = new Instantiator(this.registry, config.onInstantiate);
    this.lineage = new Lineage(this.source);
  }

  /**
   * Resolve the marker of `type` for a class or an instance of one.
   *
   * Behavior contract:
   *  - Never fails because a marker is absent: absence means defaults
   *  - Throws `MissingRequiredArgumentsError` when defaults are insufficient,
   *    at any nesting level
   *  - Throws `AmbiguousAttachmentError` when a single-value marker is
   *    attached twice to one target
   *  - Throws `InvalidSubjectError` for anything but a class or an object
   *
   * @param subject - Class constructor or an instance of it
   * @param type - Marker class to resolve
   * @returns A fully populated marker, frozen outside production
   */
  analyze<M extends object>(subject: Structure | object, type: MarkerType<M>): M {
    const structure = toStructure(subject);
    const hook = this.config.onAnalyze;
    return instrumentSync(
      hook && ((durationNs) => hook(this.source.nameOf(structure), type.name, durationNs)),
      () => this.resolveClass(structure, type)
    );
  }

  // ---- resolution ----

  private resolveClass<M extends object>(structure: Structure, type: MarkerType<M>): M {
    const target: MarkerTarget = { kind: 'class', structure };
    const subject: Subject = {
      target,
      facts: classFacts(this.source, structure),
      label: describeTarget(this.source, target),
    };
    const staged = this.locate(target, type) ?? this.instantiator.instantiate(type, undefined, subject.label);
    this.populate(staged, subject);
    return this.seal(staged);
  }

  /**
   * Resolve the marker of one component.
   *
   * @returns The marker, or undefined when the component is left out
   *          (absent and not included by default, or excluded)
   */
  private resolveComponent<P extends object>(
    descriptor: ComponentDescriptor,
    type: MarkerType<P>,
    includeByDefault: boolean,
    parent: object
  ): P | undefined {
    const target = targetOf(descriptor);
    const subject: Subject = {
      target,
      facts: componentFacts(this.source, descriptor),
      label: describeTarget(this.source, target),
    };

    const staged =
      this.locateComponent(descriptor, target, type) ??
      (includeByDefault ? this.instantiator.instantiate(type, undefined, subject.label) : undefined);
    if (!staged) return undefined;

    this.populate(staged, subject, parent);
    if (supports(staged.definition, staged.marker, 'excludable') && staged.marker.exclude()) {
      return undefined;
    }
    return this.seal(staged);
  }

  private resolveChildren<P extends object>(
    descriptors: readonly ComponentDescriptor[],
    type: MarkerType<P>,
    includeByDefault: boolean,
    parent: object
  ): Map<string, P> {
    const children = new Map<string, P>();
    for (const descriptor of descriptors) {
      const child = this.resolveComponent(descriptor, type, includeByDefault, parent);
      if (child) children.set(descriptor.name, child);
    }
    return children;
  }

  // ---- lookup ----

  /**
   * Find the attached marker for a target. Inheritable types walk the
   * target's lineage; the first entry with an attachment wins.
   */
  private locate<M extends object>(target: MarkerTarget, type: MarkerType<M>): Staged<M> | undefined {
    const definition = this.registry.definitionOf(type);
    const targets = hasFlag(definition, MARKER_INHERITABLE) ? this.lineage.searchList(target) : [target];
    for (const candidate of targets) {
      const staged = this.single(candidate, type);
      if (staged) return staged;
    }
    return undefined;
  }

  /**
   * Local lookup plus the transitive fallback: properties and parameters
   * typed to a class take that class's (possibly inherited) class-level
   * marker. Child components of the typed-to class are never parsed here.
   */
  private locateComponent<P extends object>(
    descriptor: ComponentDescriptor,
    target: MarkerTarget,
    type: MarkerType<P>
  ): Staged<P> | undefined {
    const found = this.locate(target, type);
    if (found) return found;

    const transitive =
      hasFlag(this.registry.definitionOf(type), MARKER_TRANSITIVE) &&
      (descriptor.kind === 'property' || descriptor.kind === 'parameter');
    if (transitive && descriptor.declaredType) {
      return this.locate({ kind: 'class', structure: descriptor.declaredType }, type);
    }
    return undefined;
  }

  /**
   * The one marker of `type` attached directly to `target`, instantiated.
   *
   * @throws AmbiguousAttachmentError when attached more than once
   */
  private single<M extends object>(target: MarkerTarget, type: MarkerType<M>): Staged<M> | undefined {
    const attached = this.source.attachedMarkers(target, type);
    if (attached.length === 0) return undefined;

    const label = describeTarget(this.source, target);
    if (attached.length > 1) {
      throw new AmbiguousAttachmentError(this.registry.definitionOf(type).name, label, attached.length);
    }

    const [first] = attached;
    const { marker, definition } = this.instantiator.instantiate(first.type, first.args, label);
    // A source may report markers outside the requested hierarchy; they do not match.
    return marker instanceof type ? { marker, definition } : undefined;
  }

  // ---- population ----

  private populate<M extends object>(staged: Staged<M>, subject: Subject, parent?: object): void {
    const { marker, definition } = staged;

    if (supports(definition, marker, 'reflectable')) {
      marker.fromReflection(subject.facts);
    }

    if (parent && supports(definition, marker, 'readsParent')) {
      marker.fromParent(parent);
    }

    if (supports(definition, marker, 'subMarkers')) {
      this.foldSubMarkers(marker.subMarkers(), subject);
    }

    const { target } = subject;
    if (target.kind === 'class') {
      this.populateMembers(staged, target.structure);
    } else if (target.kind === 'method' && supports(definition, marker, 'parsesParameters')) {
      const parameters = this.source.parameters(target.structure, target.name);
      marker.setParameters(
        this.resolveChildren(
          parameters,
          marker.parameterMarker(),
          marker.includeParametersByDefault(),
          marker
        )
      );
    }

    if (supports(definition, marker, 'customResolution')) {
      marker.customResolve(this);
    }

    if (supports(definition, marker, 'finalizable')) {
      marker.finalize();
    }
  }

  /**
   * Properties, methods and constants, each opted into separately.
   */
  private populateMembers<M extends object>(staged: Staged<M>, structure: Structure): void {
    const { marker, definition } = staged;

    if (supports(definition, marker, 'parsesProperties')) {
      marker.setProperties(
        this.resolveChildren(
          this.source.members(structure, 'property'),
          marker.propertyMarker(),
          marker.includePropertiesByDefault(),
          marker
        )
      );
    }

    if (supports(definition, marker, 'parsesMethods')) {
      marker.setMethods(
        this.resolveChildren(
          this.source.members(structure, 'method'),
          marker.methodMarker(),
          marker.includeMethodsByDefault(),
          marker
        )
      );
    }

    if (supports(definition, marker, 'parsesConstants')) {
      marker.setConstants(
        this.resolveChildren(
          this.source.members(structure, 'constant'),
          marker.constantMarker(),
          marker.includeConstantsByDefault(),
          marker
        )
      );
    }
  }

  /**
   * Hand each binding the sub-markers found on the same target. Inheritable
   * sub-marker types take the first lineage entry carrying any: a single
   * local sub-marker hides every ancestor's.
   */
  private foldSubMarkers(bindings: readonly SubMarkerBinding[], subject: Subject): void {
    for (const binding of bindings) {
      binding.apply(this.collectSubMarkers(subject.target, binding.type));
    }
  }

  private collectSubMarkers(target: MarkerTarget, type: MarkerType): object[] {
    const definition = this.registry.definitionOf(type);
    const targets = hasFlag(definition, MARKER_INHERITABLE) ? this.lineage.searchList(target) : [target];

    for (const candidate of targets) {
      const attached = this.source.attachedMarkers(candidate, type);
      if (attached.length === 0) continue;

      const label = describeTarget(this.source, candidate);
      if (attached.length > 1 && !hasFlag(definition, MARKER_MULTIPLE)) {
        throw new AmbiguousAttachmentError(definition.name, label, attached.length);
      }
      return attached.map((a) => this.seal(this.instantiator.instantiate(a.type, a.args, label)));
    }
    return [];
  }

  private seal<M extends object>(staged: Staged<M>): M {
    // Resolved markers are frozen outside production
    if (!isProd) Object.freeze(staged.marker);
    return staged.marker;
  }
}

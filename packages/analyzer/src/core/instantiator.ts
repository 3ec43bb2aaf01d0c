/* Instantiator
 *
 * Responsible for materializing a marker type and its raw arguments into a
 * marker instance. It handles three argument shapes:
 *  - no arguments (every field takes its default)
 *  - named arguments (a record keyed by field name)
 *  - positional arguments (bound to the schema's fields in declaration order)
 *
 * Guarantees
 *  - Arguments are validated against the marker's strict zod schema before
 *    the constructor runs; the constructor receives the parsed record with
 *    defaults filled in.
 *  - Failures map to one of three richly-typed errors: missing required
 *    fields, unknown arguments, or otherwise invalid values.
 *  - Construction is timed through the optional instantiate hook.
 */

import type { ZodIssue, ZodRawShape } from 'zod';

import {
  InvalidMarkerArgumentsError,
  MissingRequiredArgumentsError,
  UnknownMarkerArgumentsError,
} from '../errors/errors.js';
import { StaticMarkerRegistry } from '../registry/index.js';
import type { MarkerArgs, MarkerDefinition, MarkerType } from '../types/types.js';
import { instrumentSync } from './clock.js';

/**
 * A marker instance still being populated, paired with the definition of
 * its runtime type.
 */
export interface Staged<M extends object> {
  readonly marker: M;
  readonly definition: MarkerDefinition;
}

function isPositional(args: MarkerArgs): args is readonly unknown[] {
  return Array.isArray(args);
}

export class Instantiator {
  constructor(
    private readonly registry: typeof StaticMarkerRegistry = StaticMarkerRegistry,
    private readonly onInstantiate?: (marker: string, durationNs: number) => void
  ) {}

  /**
   * Build a marker instance.
   *
   * Behavior contract
   *  - Throws `MissingRequiredArgumentsError` when a field without default is
   *    not supplied. Reported first: it is the failure of defaulting.
   *  - Throws `UnknownMarkerArgumentsError` for undeclared named arguments or
   *    positional arguments past the last field.
   *  - Throws `InvalidMarkerArgumentsError` for any other schema failure.
   *
   * @param type - Marker class to construct
   * @param args - Raw arguments, or undefined for all defaults
   * @param target - Attachment site, for error messages
   */
  instantiate<M extends object>(type: MarkerType<M>, args?: MarkerArgs, target?: string): Staged<M> {
    const definition = this.registry.definitionOf(type);
    const bound = this.bind(definition, args, target);
    const result = definition.schema.safeParse(bound);
    if (!result.success) throw this.toError(definition, bound, result.error.issues, target);

    const fields = result.data;
    const hook = this.onInstantiate;
    const marker = instrumentSync(
      hook && ((durationNs) => hook(definition.name, durationNs)),
      () => new type(fields)
    );
    return { marker, definition };
  }

  /**
   * Turn raw arguments into a named record. Positional `undefined` entries
   * are left out so the field falls back to its default.
   */
  private bind(
    definition: MarkerDefinition,
    args: MarkerArgs | undefined,
    target?: string
  ): Record<string, unknown> {
    if (args === undefined) return {};
    if (!isPositional(args)) return { ...args };

    const names = definition.fieldNames;
    if (args.length > names.length) {
      const extra = args.slice(names.length).map((_, i) => `#${names.length + i}`);
      throw new UnknownMarkerArgumentsError(definition.name, extra, target);
    }

    const fields: Record<string, unknown> = {};
    args.forEach((value, i) => {
      if (value !== undefined) fields[names[i]] = value;
    });
    return fields;
  }

  /**
   * Fields left out of the bound record whose schema rejects `undefined`.
   * Decided per field, whatever issue code the field's schema raises.
   */
  private missingFields(definition: MarkerDefinition, bound: Record<string, unknown>): string[] {
    const shape: ZodRawShape = definition.schema.shape;
    return definition.fieldNames.filter(
      (name) => bound[name] === undefined && shape[name]?.safeParse(undefined).success === false
    );
  }

  private toError(
    definition: MarkerDefinition,
    bound: Record<string, unknown>,
    issues: readonly ZodIssue[],
    target?: string
  ): Error {
    const missing = this.missingFields(definition, bound);
    const unknown: string[] = [];
    const invalid: string[] = [];

    for (const issue of issues) {
      const path = issue.path.join('.');
      if (issue.code === 'unrecognized_keys') {
        unknown.push(...issue.keys);
      } else if (!missing.includes(path)) {
        invalid.push(`${path || '(root)'}: ${issue.message}`);
      }
    }

    if (missing.length > 0) return new MissingRequiredArgumentsError(definition.name, missing, target);
    if (unknown.length > 0) return new UnknownMarkerArgumentsError(definition.name, unknown, target);
    return new InvalidMarkerArgumentsError(definition.name, invalid, target);
  }
}

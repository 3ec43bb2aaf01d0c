import { isConstructor } from '../core/structure.js';
import { InvalidDecoratorTargetError } from '../errors/errors.js';
import { StaticMarkerRegistry } from '../registry/index.js';
import type { AttachedMarker, MarkerArgs, MarkerType } from '../types/types.js';
import { siteOf, type UniversalDecorator } from './site.js';

/**
 * Field record a marker class is constructed with.
 */
export type MarkerFieldsOf<C> = C extends new (fields: infer F) => object ? F : never;

/**
 * Arguments accepted by `@Attach()`: any subset of the marker's fields by
 * name, or positional values in field declaration order.
 */
export type AttachArgs<C extends MarkerType> = Partial<MarkerFieldsOf<C>> | readonly unknown[];

/**
 * Copy attachment arguments out of the decorator call so later mutation of
 * the caller's object cannot change registered metadata.
 */
function normalizeArgs(args: unknown): MarkerArgs | undefined {
  if (args === undefined) return undefined;
  if (Array.isArray(args)) return Object.freeze([...args]);
  if (typeof args === 'object' && args !== null) {
    return Object.freeze(Object.fromEntries(Object.entries(args)));
  }
  throw new InvalidDecoratorTargetError(
    '@Attach()',
    `Marker arguments must be an object or an array, received ${typeof args}.`
  );
}

/**
 * Attaches a marker to a class, property, accessor, method or method
 * parameter.
 *
 * The marker is not constructed here: arguments are recorded and validated
 * against the marker's field schema when an analyzer resolves it, so a
 * missing required field surfaces from `analyze()`.
 *
 * @param type - Marker class (decorated with @Marker() to declare fields)
 * @param args - Named fields, or positional values in field order
 *
 * @example
 * ```typescript
 * @Attach(Table, { name: 'users' })
 * class User {
 *   @Attach(Column, ['user_id'])
 *   id!: number;
 *
 *   rename(@Attach(Column, { name: 'new_name' }) next: string) {}
 * }
 * ```
 */
export function Attach<C extends MarkerType>(type: C, args?: AttachArgs<C>): UniversalDecorator {
  if (!isConstructor(type)) {
    throw new InvalidDecoratorTargetError('@Attach()', 'Expects a marker class as first argument.');
  }
  const marker: AttachedMarker = Object.freeze({ type, args: normalizeArgs(args) });

  return (target: object, key?: string | symbol, third?: number | PropertyDescriptor): void => {
    const site = siteOf('@Attach()', target, key, third);
    switch (site.kind) {
      case 'class':
        StaticMarkerRegistry.attachToClass(site.structure, marker);
        return;
      case 'member':
        StaticMarkerRegistry.attachToMember(
          site.structure,
          site.name,
          { kind: site.isMethod ? 'method' : 'property', isStatic: site.isStatic },
          marker
        );
        return;
      case 'parameter':
        StaticMarkerRegistry.attachToParameter(
          site.structure,
          site.method,
          site.position,
          { isStatic: site.isStatic },
          marker
        );
        return;
    }
  };
}

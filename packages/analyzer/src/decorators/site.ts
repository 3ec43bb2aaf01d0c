import { isStructure } from '../core/structure.js';
import { InvalidDecoratorTargetError } from '../errors/errors.js';
import type { Structure } from '../types/types.js';

/**
 * Where a legacy (experimentalDecorators) decorator was applied.
 */
export type DecorationSite =
  | { kind: 'class'; structure: Structure }
  | { kind: 'member'; structure: Structure; name: string; isStatic: boolean; isMethod: boolean }
  | { kind: 'parameter'; structure: Structure; method: string; position: number; isStatic: boolean };

/**
 * Class, property, method, accessor and parameter decorator in one.
 */
export type UniversalDecorator = ClassDecorator &
  PropertyDecorator &
  MethodDecorator &
  ParameterDecorator;

/**
 * Member decorators receive the prototype for instance members and the
 * constructor itself for static ones.
 */
function ownerOf(decorator: string, target: object): { structure: Structure; isStatic: boolean } {
  if (isStructure(target)) return { structure: target, isStatic: true };
  const ctor: unknown = target.constructor;
  if (!isStructure(ctor)) {
    throw new InvalidDecoratorTargetError(decorator, 'Target has no owning class.');
  }
  return { structure: ctor, isStatic: false };
}

function memberName(decorator: string, key: string | symbol): string {
  if (typeof key === 'symbol') {
    throw new InvalidDecoratorTargetError(
      decorator,
      `Symbol-keyed members (${key.toString()}) cannot be analyzed; use a string name.`
    );
  }
  return key;
}

/**
 * Classify the arguments a decorator was called with.
 *
 * - (ctor)                       → class
 * - (ctor, undefined, index)     → constructor parameter
 * - (target, key, index)         → method parameter
 * - (target, key, descriptor?)   → property, accessor or method
 */
export function siteOf(
  decorator: string,
  target: object,
  key?: string | symbol,
  third?: number | PropertyDescriptor
): DecorationSite {
  if (typeof third === 'number') {
    if (key === undefined) {
      if (!isStructure(target)) {
        throw new InvalidDecoratorTargetError(decorator, 'Constructor parameter target is not a class.');
      }
      return { kind: 'parameter', structure: target, method: 'constructor', position: third, isStatic: false };
    }
    const owner = ownerOf(decorator, target);
    return { kind: 'parameter', method: memberName(decorator, key), position: third, ...owner };
  }

  if (key === undefined) {
    if (!isStructure(target)) {
      throw new InvalidDecoratorTargetError(decorator, 'Class decorator target is not a class.');
    }
    return { kind: 'class', structure: target };
  }

  const owner = ownerOf(decorator, target);
  const isMethod = third !== undefined && typeof third.value === 'function';
  return { kind: 'member', name: memberName(decorator, key), isMethod, ...owner };
}

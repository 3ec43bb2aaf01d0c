import { InvalidSubjectError } from '../errors/errors.js';
import type { Constructor, Structure } from '../types/types.js';

/**
 * Runtime type guard for class constructors (abstract ones included).
 */
export function isStructure(x: unknown): x is Structure {
  return typeof x === 'function' && x !== Function.prototype;
}

/**
 * Same check as isStructure(), narrowed for call sites that construct.
 */
export function isConstructor(x: unknown): x is Constructor {
  return isStructure(x);
}

/**
 * Walk the constructor prototype chain: immediate parent first, stopping at
 * the root class.
 */
export function ancestorsOf(structure: Structure): Structure[] {
  const chain: Structure[] = [];
  let current: unknown = Object.getPrototypeOf(structure);
  while (isStructure(current)) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

/**
 * Normalize an analysis subject to its structure. Instances resolve to the
 * class that constructed them; plain objects resolve to `Object`.
 *
 * @throws InvalidSubjectError for primitives, null and prototype-less objects
 */
export function toStructure(subject: unknown): Structure {
  if (isStructure(subject)) return subject;
  if (typeof subject === 'object' && subject !== null) {
    const ctor: unknown = Object.getPrototypeOf(subject)?.constructor;
    if (isStructure(ctor)) return ctor;
  }
  throw new InvalidSubjectError(subject);
}

/**
 * Display name of a structure; anonymous classes get a placeholder.
 */
export function structureName(structure: Structure): string {
  return structure.name || '(anonymous)';
}

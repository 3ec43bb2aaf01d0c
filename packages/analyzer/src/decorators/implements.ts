import { isStructure } from '../core/structure.js';
import { InvalidDecoratorTargetError } from '../errors/errors.js';
import { StaticMarkerRegistry } from '../registry/index.js';
import type { Structure } from '../types/types.js';

/**
 * Declares the contracts a class implements.
 *
 * TypeScript interfaces vanish at runtime, so contracts are abstract
 * classes; `implements` accepts them at the type level as well. Contracts
 * are searched after every ancestor class when an inheritable class-level
 * marker is missing locally.
 *
 * @example
 * ```typescript
 * abstract class Auditable {}
 *
 * @Implements(Auditable)
 * class Invoice implements Auditable {}
 * ```
 */
export function Implements(...contracts: Structure[]): ClassDecorator {
  for (const contract of contracts) {
    if (!isStructure(contract)) {
      throw new InvalidDecoratorTargetError('@Implements()', 'Contracts must be classes.');
    }
  }
  return (target) => {
    if (!isStructure(target)) {
      throw new InvalidDecoratorTargetError('@Implements()', 'Target is not a class.');
    }
    StaticMarkerRegistry.registerContracts(target, contracts);
  };
}

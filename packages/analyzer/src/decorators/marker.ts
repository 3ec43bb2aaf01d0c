import { isConstructor } from '../core/structure.js';
import { InvalidDecoratorTargetError } from '../errors/errors.js';
import { StaticMarkerRegistry } from '../registry/index.js';
import type { MarkerOptions } from '../types/types.js';

const isProd = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

/**
 * Marks a class as a marker type.
 *
 * Registers the field schema and declared behavior in the
 * StaticMarkerRegistry at module load time. Method capabilities
 * (`fromReflection`, `setProperties`, ...) need no declaration; they are
 * detected from the class prototype when the definition is first built.
 *
 * @param options - Marker configuration
 * @param options.fields - zod object schema of the marker's fields and defaults
 * @param options.inheritable - Search ancestors when absent locally
 * @param options.transitive - Follow declared member types when absent locally
 * @param options.multiple - Allow repeated attachment (sub-markers)
 *
 * @returns Class decorator function
 *
 * @example
 * ```typescript
 * const TableFields = z.object({ name: z.string().optional() });
 *
 * @Marker({ fields: TableFields, inheritable: true })
 * class Table implements Reflectable {
 *   name?: string;
 *   constructor(fields: z.infer<typeof TableFields>) {
 *     this.name = fields.name;
 *   }
 *   fromReflection(facts: SubjectFacts) {
 *     this.name ??= facts.name;
 *   }
 * }
 * ```
 */
export function Marker(options: MarkerOptions = {}): ClassDecorator {
  return (target) => {
    if (!isConstructor(target)) {
      throw new InvalidDecoratorTargetError('@Marker()', 'Target is not a class.');
    }

    // Decorators run at module-evaluation time. Options are copied and
    // frozen so every analyzer sees the same declaration.
    const recorded: MarkerOptions = { ...options };
    if (!isProd) Object.freeze(recorded);

    StaticMarkerRegistry.registerMarker(target, recorded);
  };
}

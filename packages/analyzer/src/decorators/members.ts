import { InvalidDecoratorTargetError } from '../errors/errors.js';
import { StaticMarkerRegistry } from '../registry/index.js';
import type { Structure } from '../types/types.js';
import { siteOf } from './site.js';

export interface TypedDeclaration {
  /**
   * Declared type of the member, used for transitive markers. A thunk, so
   * classes declared later in the module can be referenced.
   */
  type?: () => Structure;
}

/**
 * Declares a property (or accessor) as a component of its class.
 *
 * Only needed for properties carrying no `@Attach()`; TypeScript erases
 * undecorated fields, so they are invisible to analysis otherwise.
 *
 * @example
 * ```typescript
 * class Order {
 *   @Prop({ type: () => Address })
 *   shipTo!: Address;
 * }
 * ```
 */
export function Prop(options: TypedDeclaration = {}): PropertyDecorator & MethodDecorator {
  return (target: object, key: string | symbol, descriptor?: PropertyDescriptor): void => {
    const site = siteOf('@Prop()', target, key, descriptor);
    if (site.kind !== 'member') return;
    StaticMarkerRegistry.declareMember(site.structure, site.name, {
      kind: 'property',
      isStatic: site.isStatic,
      type: options.type,
    });
  };
}

/**
 * Declares a method as a component of its class.
 */
export function Method(): MethodDecorator {
  return (target: object, key: string | symbol): void => {
    const site = siteOf('@Method()', target, key);
    if (site.kind !== 'member') return;
    StaticMarkerRegistry.declareMember(site.structure, site.name, {
      kind: 'method',
      isStatic: site.isStatic,
    });
  };
}

/**
 * Declares a static member as a class constant.
 *
 * @throws InvalidDecoratorTargetError on instance members
 */
export function Constant(options: TypedDeclaration = {}): PropertyDecorator {
  return (target: object, key: string | symbol): void => {
    const site = siteOf('@Constant()', target, key);
    if (site.kind !== 'member') return;
    if (!site.isStatic) {
      throw new InvalidDecoratorTargetError(
        '@Constant()',
        `Member '${site.name}' of ${site.structure.name} is not static. Constants are static members.`
      );
    }
    StaticMarkerRegistry.declareMember(site.structure, site.name, {
      kind: 'constant',
      isStatic: true,
      type: options.type,
    });
  };
}

/**
 * Names a method parameter and optionally declares its type. Parameter
 * names are erased at runtime; unnamed parameters are called `arg<index>`.
 *
 * @example
 * ```typescript
 * class Mailer {
 *   send(@Param('to', { type: () => Address }) to: Address) {}
 * }
 * ```
 */
export function Param(name?: string, options: TypedDeclaration = {}): ParameterDecorator {
  return (target: object, key: string | symbol | undefined, position: number): void => {
    const site = siteOf('@Param()', target, key, position);
    if (site.kind !== 'parameter') return;
    StaticMarkerRegistry.declareParameter(site.structure, site.method, site.position, {
      isStatic: site.isStatic,
      name,
      type: options.type,
    });
  };
}

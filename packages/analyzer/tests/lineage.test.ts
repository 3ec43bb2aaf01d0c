import { beforeEach, describe, expect, it } from 'vitest';

import { DecoratorSource } from '../src/core/decorator-source.js';
import { classFacts, componentFacts, describeTarget, targetOf } from '../src/core/facts.js';
import { Lineage } from '../src/core/lineage.js';
import { Implements, Param, Prop } from '../src/decorators/index.js';
import { StaticMarkerRegistry } from '../src/registry/static-registry.js';

describe('Lineage and facts', () => {
  const source = new DecoratorSource();
  const lineage = new Lineage(source);

  beforeEach(() => {
    StaticMarkerRegistry.resetForTests();
  });

  it('searches class targets through ancestors, then contracts', () => {
    abstract class Contract {}
    class Base {}

    @Implements(Contract)
    class Leaf extends Base {}

    expect(lineage.searchList({ kind: 'class', structure: Leaf })).toEqual([
      { kind: 'class', structure: Leaf },
      { kind: 'class', structure: Base },
      { kind: 'class', structure: Contract },
    ]);
  });

  it('searches components through ancestor classes only', () => {
    abstract class Contract {}
    class Base {}

    @Implements(Contract)
    class Leaf extends Base {}

    expect(lineage.searchList({ kind: 'parameter', structure: Leaf, method: 'run', name: 'to' })).toEqual([
      { kind: 'parameter', structure: Leaf, method: 'run', name: 'to' },
      { kind: 'parameter', structure: Base, method: 'run', name: 'to' },
    ]);
  });

  it('copies class facts as frozen names', () => {
    abstract class Contract {}
    class Base {}

    @Implements(Contract)
    class Leaf extends Base {}

    const facts = classFacts(source, Leaf);
    expect(facts).toEqual({ kind: 'class', name: 'Leaf', ancestors: ['Base'], contracts: ['Contract'] });
    expect(Object.isFrozen(facts)).toBe(true);
    expect(Object.isFrozen(facts.ancestors)).toBe(true);
  });

  it('copies component facts and derives targets', () => {
    class Address {}

    class Mailer {
      @Prop({ type: () => Address })
      static fallback = new Address();

      send(@Param('to', { type: () => Address }) _to?: Address) {}
    }

    const [property] = source.members(Mailer, 'property');
    const [param] = source.parameters(Mailer, 'send');
    if (!property || !param) throw new Error('components not declared');

    expect(componentFacts(source, property)).toEqual({
      kind: 'property',
      name: 'fallback',
      owner: 'Mailer',
      isStatic: true,
      typeName: 'Address',
    });
    expect(componentFacts(source, param)).toEqual({
      kind: 'parameter',
      name: 'to',
      owner: 'Mailer',
      method: 'send',
      position: 0,
      typeName: 'Address',
    });
    expect(targetOf(param)).toEqual({ kind: 'parameter', structure: Mailer, method: 'send', name: 'to' });
  });

  it('describes targets for messages', () => {
    class Point {}

    expect(describeTarget(source, { kind: 'class', structure: Point })).toBe('Point');
    expect(describeTarget(source, { kind: 'property', structure: Point, name: 'x' })).toBe('Point.x');
    expect(describeTarget(source, { kind: 'method', structure: Point, name: 'move' })).toBe('Point.move()');
    expect(
      describeTarget(source, { kind: 'parameter', structure: Point, method: 'move', name: 'dx' })
    ).toBe('Point.move(dx)');
  });
});

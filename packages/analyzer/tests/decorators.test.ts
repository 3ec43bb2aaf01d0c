import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';

import { Attach, Constant, Implements, Marker, Method, Param, Prop } from '../src/decorators/index.js';
import { InvalidDecoratorTargetError } from '../src/errors/errors.js';
import { StaticMarkerRegistry } from '../src/registry/static-registry.js';

describe('Decorators', () => {
  beforeEach(() => {
    StaticMarkerRegistry.resetForTests();
  });

  it('@Attach records markers at every position', () => {
    @Marker()
    class Seen {}

    @Attach(Seen)
    class Host {
      constructor(@Attach(Seen) _dep?: unknown) {}

      @Attach(Seen)
      value = 1;

      @Attach(Seen)
      static shared = 2;

      @Attach(Seen)
      get total() {
        return this.value;
      }

      @Attach(Seen)
      run(@Attach(Seen) _input?: unknown) {}
    }

    const rec = StaticMarkerRegistry.structureRecord(Host);
    expect(rec?.markers.map((m) => m.type)).toEqual([Seen]);
    expect(rec?.members.get('value')).toMatchObject({ kind: 'property', isStatic: false });
    expect(rec?.members.get('shared')).toMatchObject({ kind: 'property', isStatic: true });
    expect(rec?.members.get('total')).toMatchObject({ kind: 'property', isStatic: false });
    expect(rec?.members.get('run')).toMatchObject({ kind: 'method', isStatic: false });
    expect(rec?.members.get('run')?.parameters.get(0)?.markers).toHaveLength(1);
    expect(rec?.members.get('constructor')?.parameters.get(0)?.markers).toHaveLength(1);
  });

  it('@Attach keeps stacked attachments in source order', () => {
    const CountFields = z.object({ n: z.number() });

    @Marker({ fields: CountFields, multiple: true })
    class Count {
      n: number;
      constructor(fields: z.infer<typeof CountFields>) {
        this.n = fields.n;
      }
    }

    @Attach(Count, { n: 1 })
    @Attach(Count, { n: 2 })
    class Stacked {}

    const rec = StaticMarkerRegistry.structureRecord(Stacked);
    expect(rec?.markers.map((m) => m.args)).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('@Attach copies and freezes its arguments', () => {
    @Marker({ fields: z.object({ n: z.number() }) })
    class Count {}

    const args = { n: 1 };

    @Attach(Count, args)
    class Copied {}

    args.n = 2;

    const recorded = StaticMarkerRegistry.structureRecord(Copied)?.markers[0]?.args;
    expect(recorded).toEqual({ n: 1 });
    expect(Object.isFrozen(recorded)).toBe(true);
  });

  it('@Attach rejects non-class markers and non-object arguments', () => {
    @Marker()
    class Seen {}

    expect(() => Attach('nope' as never)).toThrow(InvalidDecoratorTargetError);
    expect(() => Attach(Seen, 5 as never)).toThrow(InvalidDecoratorTargetError);
  });

  it('rejects symbol-keyed members', () => {
    class Host {}
    const hidden = Symbol('hidden');

    expect(() => Prop()(Host.prototype, hidden)).toThrow(InvalidDecoratorTargetError);
  });

  it('@Prop, @Method and @Constant declare components without markers', () => {
    class Address {}

    class Host {
      @Prop({ type: () => Address })
      home = new Address();

      @Constant()
      static readonly LIMIT = 3;

      @Method()
      ping() {}
    }

    const rec = StaticMarkerRegistry.structureRecord(Host);
    expect(rec?.members.get('home')?.kind).toBe('property');
    expect(rec?.members.get('home')?.type?.()).toBe(Address);
    expect(rec?.members.get('LIMIT')).toMatchObject({ kind: 'constant', isStatic: true });
    expect(rec?.members.get('ping')?.kind).toBe('method');
    expect(rec?.members.get('ping')?.markers).toEqual([]);
  });

  it('@Constant rejects instance members', () => {
    class Host {
      value = 1;
    }

    expect(() => Constant()(Host.prototype, 'value')).toThrow(InvalidDecoratorTargetError);
  });

  it('@Param names parameters and resolves declared types lazily', () => {
    class Mailer {
      send(@Param('to', { type: () => Address }) _to?: unknown) {}
    }
    class Address {}

    const param = StaticMarkerRegistry.structureRecord(Mailer)?.members.get('send')?.parameters.get(0);
    expect(param?.name).toBe('to');
    expect(param?.type?.()).toBe(Address);
  });

  it('@Implements records contracts and rejects non-classes', () => {
    abstract class Auditable {}

    @Implements(Auditable)
    class Invoice {}

    expect(StaticMarkerRegistry.structureRecord(Invoice)?.contracts).toEqual([Auditable]);
    expect(() => Implements('Auditable' as never)).toThrow(InvalidDecoratorTargetError);
  });

  it('@Marker registers frozen options and rejects non-classes', () => {
    @Marker({ inheritable: true })
    class Flag {}

    const options = StaticMarkerRegistry.getBag().markers.get(Flag);
    expect(options).toEqual({ inheritable: true });
    expect(Object.isFrozen(options)).toBe(true);
    expect(() => Marker()({} as never)).toThrow(InvalidDecoratorTargetError);
  });
});

import { describe, expect, it, vi } from 'vitest';

import { Instantiator } from '../src/core/instantiator.js';
import {
  InvalidMarkerArgumentsError,
  MissingRequiredArgumentsError,
  UnknownMarkerArgumentsError,
} from '../src/errors/errors.js';
import { StaticMarkerRegistry } from '../src/registry/static-registry.js';
import { BasicMarker, Keyed, SpecialBasic, Tag } from './fixtures/markers.js';

describe('Instantiator', () => {
  const instantiator = new Instantiator();

  it('fills every field with its default when no arguments are given', () => {
    const { marker, definition } = instantiator.instantiate(BasicMarker);

    expect(marker).toBeInstanceOf(BasicMarker);
    expect(marker).toEqual({ a: 0, b: 0 });
    expect(definition.name).toBe('BasicMarker');
  });

  it('merges named arguments over defaults', () => {
    const { marker } = instantiator.instantiate(BasicMarker, { a: 2 });
    expect(marker).toEqual({ a: 2, b: 0 });
  });

  it('binds positional arguments in field order', () => {
    expect(instantiator.instantiate(BasicMarker, [1, 2]).marker).toEqual({ a: 1, b: 2 });
    expect(instantiator.instantiate(BasicMarker, [undefined, 5]).marker).toEqual({ a: 0, b: 5 });
  });

  it('rejects positional arguments past the last field', () => {
    try {
      instantiator.instantiate(BasicMarker, [1, 2, 3], 'Point');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownMarkerArgumentsError);
      if (error instanceof UnknownMarkerArgumentsError) {
        expect(error.unknown).toEqual(['#2']);
        expect(error.target).toBe('Point');
      }
    }
  });

  it('rejects undeclared named arguments', () => {
    try {
      instantiator.instantiate(BasicMarker, { c: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownMarkerArgumentsError);
      if (error instanceof UnknownMarkerArgumentsError) {
        expect(error.marker).toBe('BasicMarker');
        expect(error.unknown).toEqual(['c']);
      }
    }
  });

  it('reports values of the wrong type as invalid', () => {
    try {
      instantiator.instantiate(BasicMarker, { a: 'x' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidMarkerArgumentsError);
      if (error instanceof InvalidMarkerArgumentsError) {
        expect(error.issues).toEqual(['a: Expected number, received string']);
      }
    }
  });

  it('reports required fields without value as missing', () => {
    try {
      instantiator.instantiate(Tag, undefined, 'Lonely');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRequiredArgumentsError);
      if (error instanceof MissingRequiredArgumentsError) {
        expect(error.marker).toBe('Tag');
        expect(error.missing).toEqual(['source']);
        expect(error.target).toBe('Lonely');
      }
    }
  });

  it('reports required union and literal fields without value as missing', () => {
    try {
      instantiator.instantiate(Keyed, undefined, 'Lonely');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRequiredArgumentsError);
      if (error instanceof MissingRequiredArgumentsError) {
        expect(error.missing).toEqual(['id', 'version']);
      }
    }

    try {
      instantiator.instantiate(Keyed, { id: 'k1' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRequiredArgumentsError);
      if (error instanceof MissingRequiredArgumentsError) {
        expect(error.missing).toEqual(['version']);
      }
    }
  });

  it('reports a supplied literal of the wrong value as invalid', () => {
    try {
      instantiator.instantiate(Keyed, { id: 7, version: 2 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidMarkerArgumentsError);
      if (error instanceof InvalidMarkerArgumentsError) {
        expect(error.issues).toEqual(['version: Invalid literal value, expected 1']);
      }
    }
  });

  it('accepts union and literal fields when supplied', () => {
    expect(instantiator.instantiate(Keyed, [7, 1]).marker).toEqual({ id: 7, version: 1 });
  });

  it('reports missing fields before unknown ones', () => {
    expect(() => instantiator.instantiate(Tag, { extra: true })).toThrow(MissingRequiredArgumentsError);
  });

  it('constructs undecorated marker subclasses with the fields of their parent', () => {
    const { marker, definition } = instantiator.instantiate(SpecialBasic, { b: 4 });

    expect(marker).toBeInstanceOf(SpecialBasic);
    expect(marker).toEqual({ a: 0, b: 4 });
    expect(definition.name).toBe('SpecialBasic');
    expect(definition.fieldNames).toEqual(['a', 'b']);
  });

  it('reports construction time to the instantiate hook', () => {
    const onInstantiate = vi.fn();
    const timed = new Instantiator(StaticMarkerRegistry, onInstantiate);

    timed.instantiate(BasicMarker);

    expect(onInstantiate).toHaveBeenCalledTimes(1);
    expect(onInstantiate).toHaveBeenCalledWith('BasicMarker', expect.any(Number));
  });
});

import { describe, expect, it } from 'vitest';

import {
  AmbiguousAttachmentError,
  AnalysisCache,
  Analyzer,
  Attach,
  Constant,
  DecoratorSource,
  Implements,
  InvalidDecoratorTargetError,
  InvalidMarkerArgumentsError,
  InvalidSubjectError,
  Instantiator,
  Lineage,
  Marker,
  MemoryCacheAnalyzer,
  Method,
  MissingRequiredArgumentsError,
  Param,
  Prop,
  StaticMarkerRegistry,
  subMarker,
  subMarkers,
  UnknownMarkerArgumentsError,
} from '../src/index.js';
import { Analyzer as AnalyzerImpl } from '../src/core/analyzer.js';
import { MemoryCacheAnalyzer as CacheImpl } from '../src/core/memory-cache-analyzer.js';
import { DecoratorSource as SourceImpl } from '../src/core/decorator-source.js';
import { StaticMarkerRegistry as RegistryImpl } from '../src/registry/static-registry.js';
import * as errors from '../src/errors/errors.js';

describe('package public index', () => {
  it('re-exports core api surface', () => {
    expect(Analyzer).toBe(AnalyzerImpl);
    expect(MemoryCacheAnalyzer).toBe(CacheImpl);
    expect(DecoratorSource).toBe(SourceImpl);
    expect(StaticMarkerRegistry).toBe(RegistryImpl);
    expect(typeof AnalysisCache).toBe('function');
    expect(typeof Instantiator).toBe('function');
    expect(typeof Lineage).toBe('function');
    expect(typeof subMarker).toBe('function');
    expect(typeof subMarkers).toBe('function');
    for (const decorator of [Attach, Constant, Implements, Marker, Method, Param, Prop]) {
      expect(typeof decorator).toBe('function');
    }
  });

  it('re-exports every error class', () => {
    expect(AmbiguousAttachmentError).toBe(errors.AmbiguousAttachmentError);
    expect(InvalidDecoratorTargetError).toBe(errors.InvalidDecoratorTargetError);
    expect(InvalidMarkerArgumentsError).toBe(errors.InvalidMarkerArgumentsError);
    expect(InvalidSubjectError).toBe(errors.InvalidSubjectError);
    expect(MissingRequiredArgumentsError).toBe(errors.MissingRequiredArgumentsError);
    expect(UnknownMarkerArgumentsError).toBe(errors.UnknownMarkerArgumentsError);
  });
});

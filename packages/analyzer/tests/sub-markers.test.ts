import { describe, expect, it } from 'vitest';

import { subMarker, subMarkers } from '../src/api/sub-markers.js';
import { Analyzer } from '../src/core/analyzer.js';
import { Attach } from '../src/decorators/index.js';
import { AmbiguousAttachmentError } from '../src/errors/errors.js';
import { Documented, Label, Note } from './fixtures/markers.js';

@Attach(Note, { text: 'base-1' })
@Attach(Note, { text: 'base-2' })
@Attach(Label, { value: 'base' })
class DocBase {}

@Attach(Note, { text: 'child' })
class DocChild extends DocBase {}

class DocGrandchild extends DocBase {}

class Undocumented {}

@Attach(Label, { value: 'x' })
@Attach(Label, { value: 'y' })
class TwoLabels {}

describe('sub-markers', () => {
  const analyzer = new Analyzer();

  it('folds local sub-markers in attachment order', () => {
    const doc = analyzer.analyze(DocBase, Documented);

    expect(doc.notes).toEqual(['base-1', 'base-2']);
    expect(doc.label).toBe('base');
  });

  it('lets a single local multi-value sub-marker hide every ancestor one', () => {
    const doc = analyzer.analyze(DocChild, Documented);

    expect(doc.notes).toEqual(['child']);
    expect(doc.label).toBeUndefined();
  });

  it('inherits sub-markers when none are attached locally', () => {
    expect(analyzer.analyze(DocGrandchild, Documented).notes).toEqual(['base-1', 'base-2']);
  });

  it('hands empty results to the bindings when nothing is attached', () => {
    const doc = analyzer.analyze(Undocumented, Documented);

    expect(doc.notes).toEqual([]);
    expect(doc.label).toBeUndefined();
  });

  it('rejects a single-value sub-marker attached twice', () => {
    expect(() => analyzer.analyze(TwoLabels, Documented)).toThrow(AmbiguousAttachmentError);
  });

  it('binds handlers by marker type', () => {
    const received: unknown[] = [];
    const single = subMarker(Label, (value) => received.push(value));
    const many = subMarkers(Note, (values) => received.push(values));
    const label = new Label({ value: 'v' });
    const note = new Note({ text: 't' });

    single.apply([label]);
    single.apply([]);
    many.apply([note, label]);

    expect(single.type).toBe(Label);
    expect(many.type).toBe(Note);
    expect(received).toEqual([label, undefined, [note]]);
  });
});

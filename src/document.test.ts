import { describe, it, expect } from 'vitest';
import { Segment, SegmentedDocument } from './document.js';

describe('Segment', () => {
  it('outputs the source until resolved', () => {
    const segment = new Segment({ index: 0, content: 'Hello' });

    expect(segment.output()).toBe('Hello');
    segment.resolve('Bonjour');
    expect(segment.resolved).toBe(true);
    expect(segment.output()).toBe('Bonjour');
  });

  it('can be resolved only once', () => {
    const segment = new Segment({ index: 3, content: 'Hello' });
    segment.resolve('Bonjour');

    expect(() => segment.resolve('Salut')).toThrow('Segment 3 is already resolved');
  });

  it('needs no translation when blank or marked pass-through', () => {
    expect(new Segment({ index: 0, content: ' \n' }).needsTranslation).toBe(false);
    expect(new Segment({ index: 0, content: 'x', translate: false }).needsTranslation).toBe(false);
    expect(new Segment({ index: 0, content: 'x' }).needsTranslation).toBe(true);
  });
});

describe('SegmentedDocument', () => {
  it('merges outputs in order and counts translatable segments', () => {
    const segments = [
      new Segment({ index: 0, content: 'A ' }),
      new Segment({ index: 1, content: '`b` ', translate: false, kind: 'code' }),
      new Segment({ index: 2, content: 'C' }),
    ];
    segments[2].resolve('Z');

    const document = new SegmentedDocument(segments);

    expect(document.merge()).toBe('A `b` Z');
    expect(document.countTranslatable()).toBe(2);
  });
});

import type { SegmentInit, SegmentKind } from './types/segment.types.js';

/**
 * A slice of a document that may or may not require translation.
 */
export class Segment {
  index: number;
  readonly content: string;
  readonly translate: boolean;
  readonly kind: SegmentKind;
  readonly metadata: Record<string, unknown>;
  private _translation: string | undefined;

  constructor(init: SegmentInit) {
    this.index = init.index;
    this.content = init.content;
    this.translate = init.translate ?? true;
    this.kind = init.kind ?? 'text';
    this.metadata = init.metadata ?? {};
    this._translation = undefined;
  }

  get translation(): string | undefined {
    return this._translation;
  }

  get resolved(): boolean {
    return this._translation !== undefined;
  }

  /**
   * Set the translation. A segment is resolved exactly once.
   */
  resolve(translation: string): void {
    if (this._translation !== undefined) {
      throw new Error(`Segment ${this.index} is already resolved`);
    }
    this._translation = translation;
  }

  /** Whether this segment has to go through the remote service at all */
  get needsTranslation(): boolean {
    return this.translate && this.content.trim().length > 0;
  }

  output(): string {
    return this._translation !== undefined ? this._translation : this.content;
  }
}

export class SegmentedDocument {
  constructor(readonly segments: Segment[]) {}

  merge(): string {
    return this.segments.map((segment) => segment.output()).join('');
  }

  countTranslatable(): number {
    return this.segments.filter((segment) => segment.needsTranslation).length;
  }
}

import type { Segment } from './document.js';

export interface EmittedChunk {
  first: boolean;
  // Index of the first segment covered by this chunk
  startIndex: number;
  endIndex: number;
}

export type ChunkSink = (chunk: string, info: EmittedChunk) => void | Promise<void>;

/**
 * Releases the document as contiguous, in-order prefixes while segments
 * resolve out of order. Calls are serialized, so `notify` may be invoked from
 * any number of concurrent completions.
 */
export class OrderedEmitter {
  private nextIndex = 0;
  private chunks = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly segments: readonly Segment[],
    private readonly sink: ChunkSink
  ) {}

  /** Number of segments already handed to the sink */
  get emittedCount(): number {
    return this.nextIndex;
  }

  get chunkCount(): number {
    return this.chunks;
  }

  get done(): boolean {
    return this.nextIndex >= this.segments.length;
  }

  /**
   * Emit whatever run of resolved segments now follows the last emitted one.
   */
  notify(): Promise<void> {
    const run = this.tail.then(() => this.emitReady());
    // A failing sink must not wedge later notifications
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async emitReady(): Promise<void> {
    const startIndex = this.nextIndex;
    const ready: string[] = [];

    while (this.nextIndex < this.segments.length) {
      const segment = this.segments[this.nextIndex];
      if (!segment.resolved) {
        break;
      }
      ready.push(segment.output());
      this.nextIndex++;
    }

    const chunk = ready.join('');
    if (!chunk) {
      return;
    }

    const first = this.chunks === 0;
    this.chunks++;
    await this.sink(chunk, { first, startIndex, endIndex: this.nextIndex - 1 });
  }
}

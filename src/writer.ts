/**
 * Output writer - serializes every durable write on one background queue
 */

import PQueue from 'p-queue';
import logger, { errorMessage } from './logger.js';
import { appendText, atomicWrite } from './files.js';
import type { Sink, WriteTask } from './types/translation.types.js';

export class OutputWriter implements Sink {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly backedUp = new Set<string>();
  private readonly failed: string[] = [];

  submit(task: WriteTask): void {
    this.queue
      .add(() => this.perform(task))
      .catch((error: unknown) => {
        this.failed.push(`${task.path}: ${errorMessage(error)}`);
        logger.error('Failed to write output', { path: task.path, mode: task.mode, error: errorMessage(error) });
      });
  }

  /** Wait for the queue, then report every write that raised so far */
  async drain(): Promise<string[]> {
    await this.queue.onIdle();
    return [...this.failed];
  }

  private async perform(task: WriteTask): Promise<void> {
    if (task.mode === 'append') {
      await appendText(task.path, task.content);
      return;
    }

    // Back up the original only once, even if the path is replaced again later
    const backup = task.backup && !this.backedUp.has(task.path);
    await atomicWrite(task.path, task.content, { backup });
    if (backup) {
      this.backedUp.add(task.path);
    }
    logger.debug('Wrote output', { path: task.path, chars: task.content.length, backup });
  }
}

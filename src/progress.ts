import logger from './logger.js';

/**
 * Segment progress for a whole run. The total grows as documents are read, so
 * completions reported before any total exists are held back until one does.
 */
export class ProgressTracker {
  private total = 0;
  private completed = 0;
  private lastLoggedStep = 0;

  constructor(
    private readonly label: string = 'Translating',
    private readonly stepPercent: number = 10
  ) {}

  get snapshot(): { completed: number; total: number } {
    return { completed: this.completed, total: this.total };
  }

  addTotal(count: number): void {
    if (count <= 0) {
      return;
    }
    this.total += count;
  }

  advance(count: number): void {
    if (count <= 0) {
      return;
    }
    this.completed += count;
    if (this.total === 0) {
      return;
    }

    const percent = Math.min(100, Math.floor((this.completed / this.total) * 100));
    const step = Math.floor(percent / this.stepPercent);
    if (step > this.lastLoggedStep) {
      this.lastLoggedStep = step;
      logger.info(`${this.label}: ${this.completed}/${this.total} segments (${percent}%)`);
    }
  }
}

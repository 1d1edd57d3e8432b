/**
 * StageTracker - mirrors a delegate's progress stages as stages of our own
 * response.
 *
 * Delegates number their stages independently of us, so every remote index is
 * mapped to a stage opened on the owning Choice (with a locally allocated
 * index). Arrival order is not assumed: indices may interleave freely.
 * One tracker lives for exactly one in-flight response.
 */

import type { StageDelta } from '../types/index.js';
import { Choice, Stage, closeStageSafely } from './Choice.js';
import { logger } from '../shared/utils/logger.js';

export class StageTracker {
  private readonly stages = new Map<number, Stage>();

  constructor(
    private readonly choice: Choice,
    private readonly parent: Stage
  ) {}

  /**
   * Open a stage directly under this tracker's scope
   */
  open(name: string): Stage {
    return this.choice.openStage(name);
  }

  /**
   * Apply one delegate stage delta
   */
  update(index: number, delta: Omit<StageDelta, 'index'>): void {
    if (this.choice.isCancelled) {
      logger.debug('Discarding stage update after cancellation', { index });
      return;
    }

    let stage = this.stages.get(index);
    if (!stage) {
      // Nothing to close for an index we never saw open
      if (delta.status === 'completed') return;

      stage = this.open(delta.name ?? this.defaultName(index));
      this.stages.set(index, stage);
    }

    if (!stage.isOpen) return;

    if (delta.content) {
      stage.appendContent(delta.content);
    }
    for (const attachment of delta.attachments ?? []) {
      stage.addAttachment(attachment);
    }
    if (delta.status === 'completed') {
      closeStageSafely(stage);
    }
  }

  /**
   * Force-close every stage the delegate left open
   */
  closeAll(): void {
    if (this.choice.isCancelled) return;

    for (const [index, stage] of this.stages) {
      if (stage.isOpen) {
        logger.debug('Force-closing dangling stage', { index, stage: stage.name });
        closeStageSafely(stage);
      }
    }
  }

  get size(): number {
    return this.stages.size;
  }

  private defaultName(index: number): string {
    return `${this.parent.name} / Step ${index + 1}`;
  }
}

/**
 * Choice - the response being built for one request.
 *
 * Every mutation is forwarded to the sink as a ChoiceDelta in call order, and
 * folded locally so the complete assistant message can be returned at the end.
 * Once the request's signal is aborted all mutations are discarded.
 */

import type {
  Attachment,
  ChoiceDelta,
  Message,
  StageDelta,
  StageStatus,
} from '../types/index.js';
import { logger } from '../shared/utils/logger.js';
import { errorMessage } from '../shared/utils/errors.js';

export type ChoiceSink = (delta: ChoiceDelta) => void;

export interface ChoiceOptions {
  sink?: ChoiceSink;
  signal?: AbortSignal;
}

/**
 * One progress indicator inside a response. Opening emits the first delta for
 * its index, so no content can precede it on the wire.
 */
export class Stage {
  private _status: StageStatus = 'open';

  constructor(
    readonly index: number,
    readonly name: string,
    private readonly choice: Choice
  ) {
    choice.emitStage({ index, name, status: 'open' });
  }

  get status(): StageStatus {
    return this._status;
  }

  get isOpen(): boolean {
    return this._status === 'open';
  }

  appendContent(content: string): void {
    if (!this.isOpen || !content) return;
    this.choice.emitStage({ index: this.index, content });
  }

  addAttachment(attachment: Attachment): void {
    if (!this.isOpen) return;
    this.choice.emitStage({ index: this.index, attachments: [attachment] });
  }

  /**
   * Idempotent: closing a closed stage does nothing
   */
  close(): void {
    if (!this.isOpen) return;
    this._status = 'completed';
    this.choice.emitStage({ index: this.index, status: 'completed' });
  }
}

/**
 * Close a stage, logging instead of throwing when the close cannot be
 * delivered (for instance the client went away)
 */
export function closeStageSafely(stage: Stage): void {
  try {
    stage.close();
  } catch (error) {
    logger.warn('Failed to close stage', {
      stage: stage.name,
      index: stage.index,
      error: errorMessage(error),
    });
  }
}

export class Choice {
  private readonly sink?: ChoiceSink;
  private readonly signal?: AbortSignal;
  private nextStageIndex = 0;
  private _content = '';
  private readonly _attachments: Attachment[] = [];
  private readonly stageDeltas: StageDelta[] = [];
  private _state: unknown = undefined;

  constructor(options: ChoiceOptions = {}) {
    this.sink = options.sink;
    this.signal = options.signal;
  }

  get isCancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  get abortSignal(): AbortSignal | undefined {
    return this.signal;
  }

  get content(): string {
    return this._content;
  }

  get attachments(): readonly Attachment[] {
    return this._attachments;
  }

  get state(): unknown {
    return this._state;
  }

  /**
   * Full stage state, one entry per index
   */
  get stages(): StageDelta[] {
    return foldStageDeltas(this.stageDeltas);
  }

  appendContent(content: string): void {
    if (this.isCancelled || !content) return;
    this._content += content;
    this.emit({ type: 'content', content });
  }

  addAttachment(attachment: Attachment): void {
    if (this.isCancelled) return;
    this._attachments.push(attachment);
    this.emit({ type: 'attachment', attachment });
  }

  setState(state: unknown): void {
    if (this.isCancelled) return;
    this._state = state;
    this.emit({ type: 'state', state });
  }

  /**
   * Open a new stage; indices are allocated here and never reused
   */
  openStage(name: string): Stage {
    return new Stage(this.nextStageIndex++, name, this);
  }

  /** @internal used by Stage */
  emitStage(stage: StageDelta): void {
    if (this.isCancelled) return;
    this.stageDeltas.push(stage);
    this.emit({ type: 'stage', stage });
  }

  toMessage(): Message {
    const stages = this.stages;
    const hasCustomContent =
      this._attachments.length > 0 || this._state !== undefined || stages.length > 0;

    return {
      role: 'assistant',
      content: this._content,
      ...(hasCustomContent && {
        customContent: {
          ...(this._attachments.length > 0 && { attachments: [...this._attachments] }),
          ...(this._state !== undefined && { state: this._state }),
          ...(stages.length > 0 && { stages }),
        },
      }),
    };
  }

  private emit(delta: ChoiceDelta): void {
    this.sink?.(delta);
  }
}

/**
 * Fold stage deltas into one full stage per index, in first-seen order.
 * Content is concatenated, attachments appended, the first name kept and
 * `completed` is sticky.
 */
export function foldStageDeltas(deltas: readonly StageDelta[]): StageDelta[] {
  const folded = new Map<number, StageDelta>();

  for (const delta of deltas) {
    const current = folded.get(delta.index);
    if (!current) {
      folded.set(delta.index, {
        index: delta.index,
        ...(delta.name !== undefined && { name: delta.name }),
        status: delta.status ?? 'open',
        ...(delta.content !== undefined && { content: delta.content }),
        ...(delta.attachments !== undefined && { attachments: [...delta.attachments] }),
      });
      continue;
    }

    if (current.name === undefined && delta.name !== undefined) {
      current.name = delta.name;
    }
    if (delta.content !== undefined) {
      current.content = (current.content ?? '') + delta.content;
    }
    if (delta.attachments !== undefined) {
      current.attachments = [...(current.attachments ?? []), ...delta.attachments];
    }
    if (delta.status === 'completed') {
      current.status = 'completed';
    }
  }

  return [...folded.values()];
}

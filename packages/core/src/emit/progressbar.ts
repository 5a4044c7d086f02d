/**
 * Progress Iterator
 *
 * Wraps a sequence and reports START, DESCRIPTION_CHANGE, ADVANCE and FINISH
 * events as it is consumed. Iteration behaves the same whether or not a
 * handler renders the events.
 */

import { nanoid } from 'nanoid';
import { ProgressPhase, createProgressEvent } from '@fxlog/shared';
import type { EffectContext } from '../dispatch/context.js';

export interface ProgressbarOptions<T> {
  /** Description shown from the start */
  description?: string;
  /** Computes a new description from the item about to be processed */
  describe?: (item: T) => string;
  /** Overrides the length detected from the source */
  total?: number;
}

/**
 * Length of sources that know it up front: arrays, typed arrays, strings,
 * array-likes, sets and maps.
 */
export function knownLength(source: unknown): number | undefined {
  if (typeof source === 'string') {
    return [...source].length;
  }
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  if ('length' in source && typeof source.length === 'number') {
    return source.length;
  }
  if ('size' in source && typeof source.size === 'number') {
    return source.size;
  }
  return undefined;
}

/**
 * Event state of one progressbar call
 */
class ProgressSequence<T> {
  readonly sequenceId = nanoid();
  private current = 0;
  private description: string;
  private readonly total: number | undefined;

  constructor(
    private readonly context: EffectContext,
    source: unknown,
    private readonly options: ProgressbarOptions<T>
  ) {
    this.total = options.total ?? knownLength(source);
    this.description = options.description ?? '';
  }

  start(): void {
    this.emit(ProgressPhase.START);
  }

  /**
   * Emitted before the item is handed to the caller
   */
  describe(item: T): void {
    if (this.options.describe) {
      this.description = this.options.describe(item);
      this.emit(ProgressPhase.DESCRIPTION_CHANGE);
    }
  }

  /**
   * Emitted once the caller asks for the next item, i.e. after the work is done
   */
  advance(): void {
    this.current++;
    this.emit(ProgressPhase.ADVANCE);
  }

  finish(): void {
    this.emit(ProgressPhase.FINISH);
  }

  private emit(phase: ProgressPhase): void {
    this.context.send(
      createProgressEvent({
        sequenceId: this.sequenceId,
        total: this.total,
        current: this.current,
        description: this.description,
        phase,
      })
    );
  }
}

/**
 * Iterate `source`, reporting progress on `context`.
 *
 * @example
 * for (const file of progressbar(ctx, files, { describe: f => f.name })) {
 *   await upload(file);
 * }
 */
export function* progressbar<T>(
  context: EffectContext,
  source: Iterable<T>,
  options: ProgressbarOptions<T> = {}
): Generator<T, void, undefined> {
  const sequence = new ProgressSequence(context, source, options);
  sequence.start();
  try {
    for (const item of source) {
      sequence.describe(item);
      yield item;
      sequence.advance();
    }
  } finally {
    sequence.finish();
  }
}

/**
 * Async counterpart of {@link progressbar} for streams and other async sources.
 */
export async function* progressbarAsync<T>(
  context: EffectContext,
  source: AsyncIterable<T>,
  options: ProgressbarOptions<T> = {}
): AsyncGenerator<T, void, undefined> {
  const sequence = new ProgressSequence(context, source, options);
  sequence.start();
  try {
    for await (const item of source) {
      sequence.describe(item);
      yield item;
      sequence.advance();
    }
  } finally {
    sequence.finish();
  }
}

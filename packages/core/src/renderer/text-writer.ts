/**
 * Text Writer
 *
 * Handler that renders log lines and progress bars to a destination stream.
 * On interactive terminals the active bars occupy a region at the bottom of
 * the output; log lines are written above it and the region is redrawn.
 * Elsewhere only log lines are written, without any cursor control.
 */

import { nanoid } from 'nanoid';
import { ProgressPhase, type LogEvent, type ProgressEvent } from '@fxlog/shared';
import { getConfig } from '../config/index.js';
import type { EffectContext } from '../dispatch/context.js';
import { forward, ignore, type EventHandler, type HandlerResult } from '../dispatch/handler.js';
import { DestinationClosedError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import {
  CARRIAGE_RETURN,
  ERASE_TO_LINE_END,
  ERASE_TO_SCREEN_END,
  cursorDown,
  cursorUp,
} from './ansi.js';
import { formatBar, formatLogLine, type BarSnapshot } from './format.js';
import { claimDestination, releaseDestination } from './ownership.js';
import { RedrawScheduler } from './redraw-scheduler.js';

const logger = createLogger('renderer:text-writer');

/**
 * The part of a writable stream a writer needs. `process.stdout`,
 * `process.stderr` and `fs.WriteStream` all fit.
 */
export interface Destination {
  write(chunk: string): boolean;
  isTTY?: boolean;
  columns?: number;
  writableEnded?: boolean;
  destroyed?: boolean;
}

export interface TextWriterOptions {
  /** Stream to render to (default: process.stderr) */
  destination?: Destination;
  /** Redraw bars from a timer instead of on every update */
  async?: boolean;
  /** Timer interval for async redraws in milliseconds */
  updateIntervalMs?: number;
  /** Color level names (default: follows configuration and TTY detection) */
  colors?: boolean;
  /** Millisecond clock used for elapsed time and rates */
  clock?: () => number;
}

/**
 * An active bar as reported by {@link TextWriter.activeBars}
 */
export interface ActiveBar extends BarSnapshot {
  sequenceId: string;
}

export class TextWriter implements EventHandler {
  readonly id = nanoid(8);
  readonly name: string;
  readonly isTTY: boolean;
  readonly async: boolean;

  private readonly destination: Destination;
  private readonly colors: boolean;
  private readonly fallbackColumns: number;
  private readonly clock: () => number;
  private readonly scheduler: RedrawScheduler | null;
  private readonly uninstall: () => void;

  /** Bottom to top, in START order */
  private readonly bars: ActiveBar[] = [];
  /** Bar lines currently on screen; the cursor sits at the end of the last one */
  private drawnLines = 0;
  /** Bars whose latest state has not been drawn yet (async only) */
  private readonly dirty = new Set<string>();
  private closed = false;

  constructor(context: EffectContext, options: TextWriterOptions = {}) {
    const config = getConfig();

    this.name = `text-writer:${this.id}`;
    this.destination = options.destination ?? process.stderr;
    this.isTTY = this.destination.isTTY === true;
    this.async = options.async ?? config.async;
    this.colors =
      options.colors ?? (config.color === 'always' || (config.color === 'auto' && this.isTTY));
    this.fallbackColumns = config.fallbackColumns;
    this.clock = options.clock ?? Date.now;
    this.scheduler =
      this.async && this.isTTY
        ? new RedrawScheduler(() => this.flushDirty(), options.updateIntervalMs ?? config.updateIntervalMs)
        : null;

    claimDestination(this.destination, this.id);
    this.uninstall = context.install(this);

    logger.debug(
      { writerId: this.id, isTTY: this.isTTY, async: this.async, colors: this.colors },
      'Text writer opened'
    );
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Copies of the active bars, bottom to top
   */
  activeBars(): ActiveBar[] {
    return this.bars.map(bar => ({ ...bar }));
  }

  handleLog(event: LogEvent): HandlerResult<LogEvent> {
    if (this.closed) {
      return ignore();
    }
    this.scheduler?.rethrowPending();

    const line = formatLogLine(event, { colors: this.colors, stripEscapes: !this.isTTY });
    if (this.drawnLines > 0) {
      this.write(this.clearRegion() + line + this.drawRegion());
    } else {
      this.write(line);
    }
    return forward(event, { handled: true });
  }

  handleProgress(event: ProgressEvent): HandlerResult<ProgressEvent> {
    if (this.closed) {
      return ignore();
    }
    this.scheduler?.rethrowPending();

    if (this.isTTY) {
      switch (event.phase) {
        case ProgressPhase.START:
          this.startBar(event);
          break;
        case ProgressPhase.ADVANCE:
        case ProgressPhase.DESCRIPTION_CHANGE:
          this.updateBar(event);
          break;
        case ProgressPhase.FINISH:
          this.finishBar(event);
          break;
      }
    }
    return forward(event, { handled: this.isTTY });
  }

  /**
   * Stop the redraw timer after a final redraw, move below any bars still
   * on screen, and leave the handler stack. Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      this.scheduler?.stop();
      this.scheduler?.rethrowPending();
      if (this.drawnLines > 0) {
        this.write('\n');
      }
    } finally {
      this.bars.length = 0;
      this.dirty.clear();
      this.drawnLines = 0;
      this.uninstall();
      releaseDestination(this.destination, this.id);
      logger.debug({ writerId: this.id }, 'Text writer closed');
    }
  }

  private startBar(event: ProgressEvent): void {
    if (this.indexOf(event.sequenceId) !== -1) {
      return;
    }

    const bar: ActiveBar = {
      sequenceId: event.sequenceId,
      current: event.current,
      description: event.description,
      startedAt: this.clock(),
      finished: false,
    };
    if (event.total !== undefined) {
      bar.total = event.total;
    }
    this.bars.push(bar);

    this.write(this.clearRegion() + this.drawRegion());
    this.scheduler?.start();
  }

  private updateBar(event: ProgressEvent): void {
    const index = this.indexOf(event.sequenceId);
    const bar = this.bars[index];
    if (!bar) {
      return;
    }

    this.apply(bar, event);
    if (this.scheduler) {
      this.dirty.add(bar.sequenceId);
    } else {
      this.write(this.drawLine(index));
    }
  }

  private finishBar(event: ProgressEvent): void {
    const index = this.indexOf(event.sequenceId);
    const bar = this.bars[index];
    if (!bar) {
      return;
    }

    this.apply(bar, event);
    bar.finished = true;
    this.dirty.delete(bar.sequenceId);

    // The final state is always drawn synchronously, async or not
    let output = this.drawLine(index);
    this.bars.splice(index, 1);

    if (this.bars.length === 0) {
      // Last bar stays on screen as a record of the finished work
      output += '\n';
      this.drawnLines = 0;
    } else {
      output += this.clearRegion() + this.drawRegion();
    }
    this.write(output);

    if (this.bars.length === 0) {
      this.scheduler?.stop();
    }
  }

  private apply(bar: ActiveBar, event: ProgressEvent): void {
    bar.current = Math.max(bar.current, event.current);
    bar.description = event.description;
    if (event.total !== undefined) {
      bar.total = event.total;
    }
  }

  /**
   * Tick of the async scheduler. Runs on the event loop between producer
   * steps, so it always reads whole bar states.
   */
  private flushDirty(): void {
    if (this.dirty.size === 0) {
      return;
    }
    let output = '';
    for (const sequenceId of this.dirty) {
      const index = this.indexOf(sequenceId);
      if (index !== -1) {
        output += this.drawLine(index);
      }
    }
    this.dirty.clear();
    this.write(output);
  }

  /**
   * Move to the first bar line and erase everything below it
   */
  private clearRegion(): string {
    if (this.drawnLines === 0) {
      return '';
    }
    const output = CARRIAGE_RETURN + cursorUp(this.drawnLines - 1) + ERASE_TO_SCREEN_END;
    this.drawnLines = 0;
    return output;
  }

  /**
   * Draw every active bar starting at the current line
   */
  private drawRegion(): string {
    this.dirty.clear();
    if (this.bars.length === 0) {
      return '';
    }
    const width = this.width();
    const now = this.clock();
    const lines = this.bars.map(bar => formatBar(bar, width, now));
    this.drawnLines = lines.length;
    return CARRIAGE_RETURN + lines.join('\n') + ERASE_TO_LINE_END;
  }

  /**
   * Redraw one bar line in place and return to the last line
   */
  private drawLine(index: number): string {
    const bar = this.bars[index];
    if (!bar) {
      return '';
    }
    const offset = this.drawnLines - 1 - index;
    return (
      CARRIAGE_RETURN +
      cursorUp(offset) +
      formatBar(bar, this.width(), this.clock()) +
      ERASE_TO_LINE_END +
      cursorDown(offset)
    );
  }

  private indexOf(sequenceId: string): number {
    return this.bars.findIndex(bar => bar.sequenceId === sequenceId);
  }

  private width(): number {
    const columns = this.destination.columns;
    return columns !== undefined && columns > 0 ? columns : this.fallbackColumns;
  }

  private write(output: string): void {
    if (output === '') {
      return;
    }
    if (this.destination.writableEnded === true || this.destination.destroyed === true) {
      throw new DestinationClosedError(this.id);
    }
    this.destination.write(output);
  }
}

/**
 * Open a writer on `context`. The caller must close it.
 */
export function openTextWriter(context: EffectContext, options?: TextWriterOptions): TextWriter {
  return new TextWriter(context, options);
}

/**
 * Run `body` with a writer installed on `context`. The writer is closed when
 * `body` returns, throws, or its promise settles.
 */
export function withTextWriter<R>(
  context: EffectContext,
  options: TextWriterOptions,
  body: (writer: TextWriter) => Promise<R>
): Promise<R>;
export function withTextWriter<R>(
  context: EffectContext,
  options: TextWriterOptions,
  body: (writer: TextWriter) => R
): R;
export function withTextWriter(
  context: EffectContext,
  options: TextWriterOptions,
  body: (writer: TextWriter) => unknown
): unknown {
  const writer = new TextWriter(context, options);

  let result: unknown;
  try {
    result = body(writer);
  } catch (error) {
    closeAfterFailure(writer);
    throw error;
  }

  if (result instanceof Promise) {
    return result.then(
      value => {
        writer.close();
        return value;
      },
      (error: unknown) => {
        closeAfterFailure(writer);
        throw error;
      }
    );
  }
  writer.close();
  return result;
}

/**
 * Close after the body failed. The body's error is the one reported, so a
 * close failure is only logged.
 */
function closeAfterFailure(writer: TextWriter): void {
  try {
    writer.close();
  } catch (closeError) {
    logger.error({ writerId: writer.id, error: closeError }, 'Text writer failed to close');
  }
}

import type { LogEvent, ProgressEvent } from '@fxlog/shared';

/**
 * What a handler decided to do with an event.
 *
 * - consume: stop propagation, the event counts as handled
 * - forward: pass the (possibly replaced) event outward; handled only when
 *   the handler output it, as renderers do
 * - ignore: pass the event outward unchanged, not handled
 */
export type HandlerResult<E> =
  | { action: 'consume' }
  | { action: 'forward'; event: E; handled: boolean }
  | { action: 'ignore' };

export interface ForwardOptions {
  /** The handler output the event; no fallback is needed for it */
  handled?: boolean;
}

/**
 * A handler on the context stack. Each method is optional; a handler that
 * has no method for a kind is skipped for that kind.
 */
export interface EventHandler {
  readonly name: string;
  handleLog?(event: LogEvent): HandlerResult<LogEvent>;
  handleProgress?(event: ProgressEvent): HandlerResult<ProgressEvent>;
}

export function consume<E>(): HandlerResult<E> {
  return { action: 'consume' };
}

export function forward<E>(event: E, options: ForwardOptions = {}): HandlerResult<E> {
  return { action: 'forward', event, handled: options.handled ?? false };
}

export function ignore<E>(): HandlerResult<E> {
  return { action: 'ignore' };
}

/**
 * Build a handler for log events only
 */
export function onLog(
  name: string,
  fn: (event: LogEvent) => HandlerResult<LogEvent>
): EventHandler {
  return { name, handleLog: fn };
}

/**
 * Build a handler for progress events only
 */
export function onProgress(
  name: string,
  fn: (event: ProgressEvent) => HandlerResult<ProgressEvent>
): EventHandler {
  return { name, handleProgress: fn };
}

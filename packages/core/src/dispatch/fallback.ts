/**
 * Fallback Policy
 *
 * Applied when an event travels the whole stack without being handled.
 * A log event is re-sent once as a tagged warning; a tagged warning that is
 * still unhandled is dropped. Progress events have no fallback output.
 */

import {
  LogLevel,
  createLogEvent,
  levelName,
  renderMessage,
  type FxEvent,
  type LogEvent,
} from '@fxlog/shared';
import { createLogger } from '../utils/logger.js';
import type { DispatchResult } from './context.js';

const log = createLogger('dispatch:fallback');

export interface Dispatcher {
  dispatch(event: FxEvent): DispatchResult;
}

/**
 * The warning sent in place of an unhandled log event
 */
export function fallbackWarning(event: LogEvent): LogEvent {
  return createLogEvent(
    LogLevel.WARNING,
    () =>
      `No handler processed log message (level=${levelName(event.level)}): ` +
      renderMessage(event),
    true
  );
}

export function applyFallback(dispatcher: Dispatcher, event: FxEvent): void {
  if (event.kind === 'progress') {
    return;
  }

  if (event.fallback) {
    log.debug({ level: event.level }, 'Unhandled fallback warning dropped');
    return;
  }

  const { handled } = dispatcher.dispatch(fallbackWarning(event));
  if (!handled) {
    log.debug({ level: event.level }, 'Unhandled log event dropped');
  }
}

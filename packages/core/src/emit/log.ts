import { LogLevel, createLogEvent, type LogLevelValue } from '@fxlog/shared';
import type { EffectContext } from '../dispatch/context.js';

/**
 * Send a log event. Pass a function as the message to defer formatting
 * until a handler renders it.
 */
export function log(context: EffectContext, level: LogLevelValue, message: unknown): void {
  context.send(createLogEvent(level, message));
}

export function logDebug(context: EffectContext, message: unknown): void {
  log(context, LogLevel.DEBUG, message);
}

export function logInfo(context: EffectContext, message: unknown): void {
  log(context, LogLevel.INFO, message);
}

export function logWarning(context: EffectContext, message: unknown): void {
  log(context, LogLevel.WARNING, message);
}

export function logError(context: EffectContext, message: unknown): void {
  log(context, LogLevel.ERROR, message);
}

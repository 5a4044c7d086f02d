import { inspect } from 'node:util';
import { z } from 'zod';
import { EventValidationError } from '../errors.js';

// Log Level
export const LogLevel = {
  DEBUG: 0,
  INFO: 10,
  WARNING: 50,
  ERROR: 100,
} as const;

export type LogLevelName = keyof typeof LogLevel;

/**
 * Any integer is a valid level; the named ones are only landmarks.
 */
export type LogLevelValue = number;

// Progress Phase
export const ProgressPhase = {
  START: 'start',
  ADVANCE: 'advance',
  DESCRIPTION_CHANGE: 'description_change',
  FINISH: 'finish',
} as const;

export type ProgressPhase = (typeof ProgressPhase)[keyof typeof ProgressPhase];

/**
 * Message producer evaluated only when the event is rendered.
 */
export type LazyMessage = () => unknown;

export interface LogEvent {
  readonly kind: 'log';
  readonly level: LogLevelValue;
  readonly message: unknown;
  /** Set on the warning re-sent by the fallback policy */
  readonly fallback: boolean;
}

export interface ProgressEvent {
  readonly kind: 'progress';
  readonly sequenceId: string;
  readonly total?: number;
  readonly current: number;
  readonly description: string;
  readonly phase: ProgressPhase;
}

export type FxEvent = LogEvent | ProgressEvent;

export type FxEventKind = FxEvent['kind'];

// =============================================================================
// Schemas
// =============================================================================

export const logEventSchema = z.object({
  level: z.number().int(),
  message: z.unknown(),
  fallback: z.boolean().default(false),
});

export const progressEventSchema = z.object({
  sequenceId: z.string().min(1),
  total: z.number().int().min(0).optional(),
  current: z.number().int().min(0),
  description: z.string().default(''),
  phase: z.nativeEnum(ProgressPhase),
});

export interface ProgressEventInit {
  sequenceId: string;
  total?: number | undefined;
  current: number;
  description?: string | undefined;
  phase: ProgressPhase;
}

function toIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'event';
    return `${path}: ${issue.message}`;
  });
}

// =============================================================================
// Constructors
// =============================================================================

export function createLogEvent(
  level: LogLevelValue,
  message: unknown,
  fallback = false
): LogEvent {
  const result = logEventSchema.safeParse({ level, message, fallback });
  if (!result.success) {
    throw new EventValidationError('log', toIssues(result.error));
  }
  const event: LogEvent = {
    kind: 'log',
    level: result.data.level,
    message,
    fallback: result.data.fallback,
  };
  return Object.freeze(event);
}

export function createProgressEvent(init: ProgressEventInit): ProgressEvent {
  const result = progressEventSchema.safeParse(init);
  if (!result.success) {
    throw new EventValidationError('progress', toIssues(result.error));
  }
  const { sequenceId, total, current, description, phase } = result.data;
  const event: ProgressEvent =
    total !== undefined
      ? { kind: 'progress', sequenceId, total, current, description, phase }
      : { kind: 'progress', sequenceId, current, description, phase };
  return Object.freeze(event);
}

/**
 * Build a new log event from an existing one. The source is left untouched.
 */
export function deriveLogEvent(
  event: LogEvent,
  changes: { level?: LogLevelValue; message?: unknown }
): LogEvent {
  return createLogEvent(
    changes.level ?? event.level,
    'message' in changes ? changes.message : event.message,
    event.fallback
  );
}

// =============================================================================
// Helpers
// =============================================================================

const LEVEL_NAMES = new Map<number, LogLevelName>([
  [LogLevel.DEBUG, 'DEBUG'],
  [LogLevel.INFO, 'INFO'],
  [LogLevel.WARNING, 'WARNING'],
  [LogLevel.ERROR, 'ERROR'],
]);

export function levelName(level: LogLevelValue): string {
  return LEVEL_NAMES.get(level) ?? `LEVEL_${level}`;
}

export function isLazyMessage(message: unknown): message is LazyMessage {
  return typeof message === 'function';
}

/**
 * Turn a log message into text. Lazy messages are evaluated here, so the
 * cost is only paid by handlers that actually render.
 */
export function stringifyMessage(message: unknown): string {
  const value = isLazyMessage(message) ? message() : message;
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`;
  }
  return inspect(value);
}

const renderedMessages = new WeakMap<LogEvent, string>();

/**
 * Text of an event's message. A lazy message is evaluated at most once per
 * event, however many handlers render it.
 */
export function renderMessage(event: LogEvent): string {
  const cached = renderedMessages.get(event);
  if (cached !== undefined) {
    return cached;
  }
  const text = stringifyMessage(event.message);
  renderedMessages.set(event, text);
  return text;
}

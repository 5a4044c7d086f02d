/**
 * Fallback Policy Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  LogLevel,
  ProgressPhase,
  createLogEvent,
  createProgressEvent,
  deriveLogEvent,
  stringifyMessage,
} from '@fxlog/shared';
import { createContext } from '../src/dispatch/context.js';
import { fallbackWarning } from '../src/dispatch/fallback.js';
import { consume, forward, ignore, onLog } from '../src/dispatch/handler.js';
import { logDebug, logError, logInfo, logWarning } from '../src/emit/log.js';
import { createRecorder } from './helpers/recorder.js';

describe('Fallback policy', () => {
  it('should re-send an unhandled log event once as a tagged warning', () => {
    const context = createContext();
    const recorder = createRecorder();
    context.install(recorder);

    logInfo(context, 'hello');

    expect(recorder.logs).toHaveLength(2);
    const [original, warning] = recorder.logs;
    expect(original?.level).toBe(LogLevel.INFO);
    expect(original?.fallback).toBe(false);
    expect(warning?.level).toBe(LogLevel.WARNING);
    expect(warning?.fallback).toBe(true);
    expect(stringifyMessage(warning?.message)).toBe(
      'No handler processed log message (level=INFO): hello'
    );
  });

  it('should emit exactly one warning per unhandled event', () => {
    const context = createContext();
    const recorder = createRecorder();
    context.install(recorder);

    logDebug(context, 'a');
    logWarning(context, 'b');
    logError(context, 'c');

    const warnings = recorder.logs.filter(event => event.fallback);
    expect(warnings).toHaveLength(3);
    expect(warnings.map(event => stringifyMessage(event.message))).toEqual([
      'No handler processed log message (level=DEBUG): a',
      'No handler processed log message (level=WARNING): b',
      'No handler processed log message (level=ERROR): c',
    ]);
  });

  it('should still warn when a transform forwards the event but nothing renders it', () => {
    const context = createContext();
    const recorder = createRecorder();
    context.install(recorder);
    context.install(onLog('request-id', event =>
      forward(deriveLogEvent(event, { message: `[req-1] ${stringifyMessage(event.message)}` }))
    ));

    logInfo(context, 'hello');

    expect(recorder.logs.map(event => [event.level, event.fallback, stringifyMessage(event.message)])).toEqual([
      [LogLevel.INFO, false, '[req-1] hello'],
      [
        LogLevel.WARNING,
        true,
        '[req-1] No handler processed log message (level=INFO): [req-1] hello',
      ],
    ]);
  });

  it('should not warn when a handler forwards the event as handled', () => {
    const context = createContext();
    const recorder = createRecorder();
    context.install(recorder);
    context.install(onLog('printer', event => forward(event, { handled: true })));

    logInfo(context, 'printed');

    expect(recorder.logs).toHaveLength(1);
    expect(recorder.logs[0]?.fallback).toBe(false);
  });

  it('should evaluate a lazy message once for the event and its warning', () => {
    const context = createContext();
    const recorder = createRecorder();
    context.install(recorder);
    let calls = 0;

    logInfo(context, () => {
      calls++;
      return 'computed';
    });
    const [original, warning] = recorder.logs;

    expect(stringifyMessage(warning?.message)).toBe(
      'No handler processed log message (level=INFO): computed'
    );
    expect(calls).toBe(1);
    expect(original?.fallback).toBe(false);
  });

  it('should do nothing visible without any handler', () => {
    const context = createContext();

    expect(() => logInfo(context, 'nobody listens')).not.toThrow();
  });

  it('should never evaluate a lazy message nobody renders', () => {
    const context = createContext();
    let calls = 0;

    logDebug(context, () => {
      calls++;
      return 'expensive';
    });

    expect(calls).toBe(0);
  });

  it('should let a warning handler receive the fallback', () => {
    const context = createContext();
    const received: string[] = [];
    context.install(onLog('warnings-only', event => {
      if (event.level !== LogLevel.WARNING) {
        return ignore();
      }
      received.push(stringifyMessage(event.message));
      return consume();
    }));

    logError(context, 'disk full');

    expect(received).toEqual(['No handler processed log message (level=ERROR): disk full']);
  });

  it('should drop a fallback warning that is sent again', () => {
    const context = createContext();
    const recorder = createRecorder();
    context.install(recorder);

    context.send(fallbackWarning(createLogEvent(LogLevel.INFO, 'x')));

    expect(recorder.logs).toHaveLength(1);
  });

  it('should not re-send handled events', () => {
    const context = createContext();
    const recorder = createRecorder('outer');
    context.install(recorder);
    context.install(onLog('sink', () => consume()));

    logInfo(context, 'handled');

    expect(recorder.logs).toHaveLength(0);
  });

  it('should ignore unhandled progress events', () => {
    const context = createContext();
    const recorder = createRecorder();
    context.install(recorder);

    context.send(createProgressEvent({ sequenceId: 's', current: 0, phase: ProgressPhase.START }));

    expect(recorder.progress).toHaveLength(1);
    expect(recorder.logs).toHaveLength(0);
  });
});

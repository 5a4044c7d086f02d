/**
 * Formatting Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { LogLevel, createLogEvent } from '@fxlog/shared';
import { cursorDown, cursorUp, stripAnsi } from '../src/renderer/ansi.js';
import { formatBar, formatDuration, formatLogLine, type BarSnapshot } from '../src/renderer/format.js';

function bar(overrides: Partial<BarSnapshot> = {}): BarSnapshot {
  return { current: 0, description: '', startedAt: 0, finished: false, ...overrides };
}

describe('formatLogLine', () => {
  const plain = { colors: false, stripEscapes: false };

  it('should write the level name in brackets', () => {
    expect(formatLogLine(createLogEvent(LogLevel.INFO, 'ok'), plain)).toBe('[INFO] ok\n');
    expect(formatLogLine(createLogEvent(LogLevel.WARNING, 'hm'), plain)).toBe('[WARNING] hm\n');
  });

  it('should label levels without a name by value', () => {
    expect(formatLogLine(createLogEvent(30, 'custom'), plain)).toBe('[LEVEL_30] custom\n');
  });

  it('should evaluate lazy messages', () => {
    expect(formatLogLine(createLogEvent(LogLevel.DEBUG, () => 'late'), plain)).toBe('[DEBUG] late\n');
  });

  it('should color level names when enabled', () => {
    const options = { colors: true, stripEscapes: false };

    expect(formatLogLine(createLogEvent(LogLevel.ERROR, 'bad'), options)).toBe(
      '[\x1b[31mERROR\x1b[0m] bad\n'
    );
    expect(formatLogLine(createLogEvent(LogLevel.INFO, 'fine'), options)).toBe('[INFO] fine\n');
  });

  it('should strip escapes from the message when asked', () => {
    const event = createLogEvent(LogLevel.INFO, '\x1b[31mred\x1b[0m');

    expect(formatLogLine(event, { colors: false, stripEscapes: true })).toBe('[INFO] red\n');
  });

  it('should label every line of a multi-line message', () => {
    const event = createLogEvent(LogLevel.INFO, 'First line\nSecond line\nThird line');

    expect(formatLogLine(event, plain)).toBe(
      '[INFO] + First line\n[INFO] | Second line\n[INFO] + Third line\n'
    );
  });

  it('should mark both lines of a two-line message as ends', () => {
    expect(formatLogLine(createLogEvent(LogLevel.ERROR, 'a\nb'), plain)).toBe(
      '[ERROR] + a\n[ERROR] + b\n'
    );
  });

  it('should evaluate a lazy message once per event', () => {
    let calls = 0;
    const event = createLogEvent(LogLevel.INFO, () => {
      calls++;
      return 'once';
    });

    formatLogLine(event, plain);
    formatLogLine(event, { colors: true, stripEscapes: true });

    expect(calls).toBe(1);
  });
});

describe('formatDuration', () => {
  it('should format seconds, minutes, hours and days', () => {
    expect(formatDuration(0)).toBe(' 0s');
    expect(formatDuration(5)).toBe(' 5s');
    expect(formatDuration(75)).toBe(' 1m15s');
    expect(formatDuration(3725)).toBe(' 1h 2m');
    expect(formatDuration(2 * 86400 + 3 * 3600)).toBe('2d 3h 0m');
  });

  it('should format an unknown duration', () => {
    expect(formatDuration(Infinity)).toBe('inf');
  });
});

describe('formatBar', () => {
  it('should draw an empty bar at the start', () => {
    expect(formatBar(bar({ total: 3 }), 40, 0)).toBe(
      '0%|------------| 0/3 [ 0s<inf, 0.00it/s]'
    );
  });

  it('should fill the bar in proportion', () => {
    expect(formatBar(bar({ total: 3, current: 1 }), 40, 0)).toBe(
      '33%|███--------| 1/3 [ 0s< 0s, 0.00it/s]'
    );
  });

  it('should show description, elapsed time, eta and slow rates', () => {
    const line = formatBar(bar({ total: 4, current: 1, description: 'copy' }), 40, 2000);

    expect(line).toBe('copy: 25%|█----| 1/4 [ 2s< 6s, 2.00s/it]');
  });

  it('should draw an indeterminate bar when the total is unknown', () => {
    expect(formatBar(bar({ current: 4 }), 40, 2000)).toBe(
      `${'-'.repeat(22)} 4 [ 2s, 2.00it/s]`
    );
  });

  it('should fill an indeterminate bar once finished', () => {
    expect(formatBar(bar({ current: 4, finished: true }), 40, 2000)).toBe(
      `${'█'.repeat(22)} 4 [ 2s, 2.00it/s]`
    );
  });

  it('should cap the percentage when the count passes the total', () => {
    expect(formatBar(bar({ total: 3, current: 5 }), 40, 0)).toMatch(/^100%\|█+\| 5\/5 /);
  });

  it('should keep a description on one row', () => {
    const line = formatBar(bar({ total: 2, description: 'file\nname' }), 40, 0);

    expect(line.startsWith('file name: 0%|')).toBe(true);
    expect(line).not.toContain('\n');
  });

  it('should drop escapes and tabs from a description', () => {
    const line = formatBar(bar({ total: 2, description: '\x1b[31mred\x1b[0m\ttab' }), 40, 0);

    expect(line.startsWith('red tab: 0%|')).toBe(true);
  });

  it('should never exceed the width', () => {
    expect(formatBar(bar({ total: 3, description: 'x'.repeat(50) }), 40, 0)).toBe('x'.repeat(40));
  });
});

describe('ansi helpers', () => {
  it('should move the cursor only for positive counts', () => {
    expect(cursorUp(0)).toBe('');
    expect(cursorUp(2)).toBe('\x1b[2A');
    expect(cursorDown(1)).toBe('\x1b[1B');
  });

  it('should strip color and cursor sequences', () => {
    expect(stripAnsi('\r\x1b[1A\x1b[Jdone\x1b[K')).toBe('\rdone');
  });
});

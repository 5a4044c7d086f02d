import {
  LogLevel,
  levelName,
  renderMessage,
  type LogEvent,
} from '@fxlog/shared';
import { colorize, stripAnsi, type Color } from './ansi.js';

const MIN_BAR_LENGTH = 5;
const FILL = '█';
const EMPTY = '-';

/**
 * State of a progress bar as needed for drawing one line
 */
export interface BarSnapshot {
  current: number;
  total?: number;
  description: string;
  /** Clock reading (ms) at START */
  startedAt: number;
  finished: boolean;
}

export interface LogLineOptions {
  colors: boolean;
  /** Drop escape sequences contained in the message */
  stripEscapes: boolean;
}

const LEVEL_COLORS = new Map<number, Color>([
  [LogLevel.DEBUG, 'gray'],
  [LogLevel.WARNING, 'yellow'],
  [LogLevel.ERROR, 'red'],
]);

/**
 * Format a log event as `[LEVEL] message` followed by a newline. A message
 * spanning several lines gets the label on each of them, with `+ ` on the
 * first and last line and `| ` in between.
 */
export function formatLogLine(event: LogEvent, options: LogLineOptions): string {
  const rendered = renderMessage(event);
  const text = options.stripEscapes ? stripAnsi(rendered) : rendered;
  const name = levelName(event.level);
  const color = LEVEL_COLORS.get(event.level);
  const label = color ? colorize(name, color, options.colors) : name;

  const lines = text.split('\n');
  if (lines.length === 1) {
    return `[${label}] ${text}\n`;
  }
  const last = lines.length - 1;
  return lines
    .map((line, index) => {
      const marker = index === 0 || index === last ? '+' : '|';
      return `[${label}] ${marker} ${line}\n`;
    })
    .join('');
}

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/g;

/**
 * Description text that fits on one terminal row
 */
function singleLine(description: string): string {
  return stripAnsi(description).replace(CONTROL_CHARACTERS, ' ');
}

/**
 * Format a duration in seconds, e.g. ` 5s`, ` 2m 7s`, ` 1h 0m`, `2d 3h 0m`.
 */
export function formatDuration(totalSeconds: number): string {
  if (!Number.isFinite(totalSeconds)) {
    return 'inf';
  }

  const days = Math.floor(totalSeconds / 86400);
  let remaining = totalSeconds % 86400;
  const hours = Math.floor(remaining / 3600);
  remaining %= 3600;
  const minutes = Math.floor(remaining / 60);
  const seconds = remaining % 60;

  const parts: string[] = [];
  if (days > 0) {
    parts.push(`${days}d`);
  }
  if (days > 0 || hours > 0) {
    parts.push(`${String(hours).padStart(2)}h`);
  }
  if (days > 0 || hours > 0 || minutes > 0) {
    parts.push(`${String(minutes).padStart(2)}m`);
  }
  if (days === 0 && hours === 0) {
    parts.push(`${seconds.toFixed(0).padStart(2)}s`);
  }
  return parts.join('');
}

function formatRate(current: number, elapsedSeconds: number): string {
  if (elapsedSeconds <= 0 || current <= 0) {
    return ', 0.00it/s';
  }
  const rate = current / elapsedSeconds;
  return rate >= 1 ? `, ${rate.toFixed(2)}it/s` : `, ${(1 / rate).toFixed(2)}s/it`;
}

/**
 * Format one bar line, at most `width` characters.
 *
 * Known total:   `desc: 40%|████------| 2/5 [ 1s< 2s, 2.00it/s]`
 * Unknown total: `desc: ----------- 2 [ 1s, 2.00it/s]`, filled once finished
 */
export function formatBar(bar: BarSnapshot, width: number, now: number): string {
  const description = singleLine(bar.description);
  const prefix = description ? `${description}: ` : '';
  const elapsed = Math.max(0, (now - bar.startedAt) / 1000);
  const rate = formatRate(bar.current, elapsed);

  let line: string;
  if (bar.total !== undefined && bar.total > 0) {
    const total = Math.max(bar.current, bar.total);
    const percentage = Math.min(100, Math.floor((100 * bar.current) / total));
    const head = `${percentage}%|`;
    const eta = bar.current > 0 ? (elapsed / bar.current) * (total - bar.current) : Infinity;
    const tail = `| ${bar.current}/${total} [${formatDuration(elapsed)}<${formatDuration(eta)}${rate}]`;
    const length = Math.max(MIN_BAR_LENGTH, width - prefix.length - head.length - tail.length);
    const filled = Math.floor((length * bar.current) / total);
    line = `${prefix}${head}${FILL.repeat(filled)}${EMPTY.repeat(length - filled)}${tail}`;
  } else {
    const tail = ` ${bar.current} [${formatDuration(elapsed)}${rate}]`;
    const length = Math.max(MIN_BAR_LENGTH, width - prefix.length - tail.length);
    line = `${prefix}${(bar.finished ? FILL : EMPTY).repeat(length)}${tail}`;
  }

  return line.slice(0, width);
}

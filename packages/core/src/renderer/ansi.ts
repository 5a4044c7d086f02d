/**
 * ANSI sequences used by writers on interactive terminals.
 */

const CSI = '\x1b[';

export const colors = {
  reset: `${CSI}0m`,
  bold: `${CSI}1m`,
  red: `${CSI}31m`,
  yellow: `${CSI}33m`,
  cyan: `${CSI}36m`,
  gray: `${CSI}90m`,
} as const;

export type Color = keyof typeof colors;

export const CARRIAGE_RETURN = '\r';
export const ERASE_TO_LINE_END = `${CSI}K`;
export const ERASE_TO_SCREEN_END = `${CSI}J`;

export function cursorUp(lines: number): string {
  return lines > 0 ? `${CSI}${lines}A` : '';
}

export function cursorDown(lines: number): string {
  return lines > 0 ? `${CSI}${lines}B` : '';
}

/**
 * Wrap text in a color when enabled
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

const ANSI_PATTERN = /\x1b\[[0-9;?]*[A-Za-z]/g;

/**
 * Remove color and cursor sequences, for destinations that are not terminals
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/**
 * ANSI Escape Code Constants
 *
 * The VT100 subset the editor emits: cursor visibility and placement,
 * line erase, reverse video and the eight basic foreground colors.
 */

// Control characters
export const ESC = '\x1b';
export const CSI = `${ESC}[`;  // Control Sequence Introducer

// Cursor control
export const CURSOR = {
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
  home: `${CSI}H`,
  // Position: row and col are 1-indexed
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
  // Push the cursor to the bottom-right corner; the terminal clamps at the edge
  toBottomRight: `${CSI}999C${CSI}999B`,
  queryPosition: `${CSI}6n`,
};

// Screen control
export const SCREEN = {
  clear: `${CSI}2J`,
  clearToEnd: `${CSI}K`,
};

// Text styles
export const STYLE = {
  reset: `${CSI}m`,
  inverse: `${CSI}7m`,
};

// Basic foreground colors
export const FG = {
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  default: 39,
} as const;

/**
 * Foreground color escape for an SGR color number.
 */
export function fgColor(code: number): string {
  return `${CSI}${code}m`;
}

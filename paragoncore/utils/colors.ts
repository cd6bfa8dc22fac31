// paragoncore/utils/colors.ts

// ANSI helpers for the console logger.

export const Colors = {
  Reset: "\x1b[0m",
  Dim: "\x1b[2m",

  FgRed: "\x1b[31m",
  FgGreen: "\x1b[32m",
  FgYellow: "\x1b[33m",
  FgCyan: "\x1b[36m",

  BrightGreen: "\x1b[92m",
  BrightCyan: "\x1b[96m",
} as const;

export type ColorCode = (typeof Colors)[keyof typeof Colors];

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function colorize(text: string, color?: ColorCode): string {
  if (!color) return text;
  return `${color}${text}${Colors.Reset}`;
}

/** Used when output is not a TTY (piped server logs, CI). */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

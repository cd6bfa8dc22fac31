// paragoncore/utils/logger.ts

import { Colors, colorize, stripAnsi, type ColorCode } from "./colors";
import { type LogLevel, logEnabled } from "../config/logconfig";

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

function levelColor(level: LogLevel): ColorCode {
  switch (level) {
    case "debug":
      return Colors.BrightCyan;
    case "info":
      return Colors.FgGreen;
    case "warn":
      return Colors.FgYellow;
    case "error":
    default:
      return Colors.FgRed;
  }
}

function formatMeta(value: unknown): unknown {
  if (value instanceof Error) {
    return { error: value.message, name: value.name, stack: value.stack };
  }

  // Errors nested one level deep ({ err }) are the common case in this codebase.
  if (value && typeof value === "object" && !Array.isArray(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = v instanceof Error ? formatMeta(v) : v;
    }
    return out;
  }

  return value;
}

export class Logger {
  private constructor(private readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, color: ColorCode, args: unknown[]): void {
    if (!logEnabled(this.scope, level)) return;

    let tag = colorize(`[${this.scope}:${level.toUpperCase()}]`, color);
    if (!process.stdout.isTTY) tag = stripAnsi(tag);

    const [first, ...rest] = args;
    const head = typeof first === "string" ? `${timestamp()} ${tag} ${first}` : `${timestamp()} ${tag}`;
    const meta = (typeof first === "string" ? rest : args).map(formatMeta);

    if (level === "error") {
      console.error(head, ...meta);
    } else {
      console.log(head, ...meta);
    }
  }

  debug(...args: unknown[]): void {
    this.write("debug", levelColor("debug"), args);
  }

  info(...args: unknown[]): void {
    this.write("info", levelColor("info"), args);
  }

  warn(...args: unknown[]): void {
    this.write("warn", levelColor("warn"), args);
  }

  error(...args: unknown[]): void {
    this.write("error", levelColor("error"), args);
  }

  // info level, bright tag
  success(...args: unknown[]): void {
    this.write("info", Colors.BrightGreen, args);
  }
}

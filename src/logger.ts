import chalk from "chalk";

/** Du plus grave au plus bavard. */
const LOG_LEVELS = ["error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogFn = (message: unknown, ...args: unknown[]) => void;

interface LevelStyle {
  paint: (text: string) => string;
  write: (line: string) => void;
}

// console.* résolu à l'appel (les tests l'espionnent)
const styles: Record<LogLevel, LevelStyle> = {
  error: { paint: (t) => chalk.red.bold(t), write: (l) => console.error(l) },
  warn: { paint: (t) => chalk.yellow(t), write: (l) => console.warn(l) },
  info: { paint: (t) => chalk.cyan(t), write: (l) => console.log(l) },
  debug: { paint: (t) => chalk.gray(t), write: (l) => console.log(l) },
  trace: { paint: (t) => chalk.magenta(t), write: (l) => console.log(l) },
};

/**
 * Valide un niveau de log (insensible à la casse).
 * @returns Le niveau reconnu, ou null
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const v = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === v) ?? null;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel);
}

/** Une erreur s'affiche avec le message de sa cause. */
function stringify(value: unknown): string {
  if (value instanceof Error) {
    return value.cause instanceof Error ? `${value.message} (${value.cause.message})` : value.message;
  }
  return String(value);
}

function emitter(level: LogLevel): LogFn {
  return (message, ...args) => {
    if (!enabled(level)) return;
    const text = [message, ...args].map(stringify).join(" ");
    const { paint, write } = styles[level];
    write(paint(`[${new Date().toISOString()}] [${level.toUpperCase()}] ${text}`));
  };
}

export const logger: Record<LogLevel, LogFn> = {
  error: emitter("error"),
  warn: emitter("warn"),
  info: emitter("info"),
  debug: emitter("debug"),
  trace: emitter("trace"),
};

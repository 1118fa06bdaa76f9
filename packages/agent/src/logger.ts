type Level = "debug" | "info" | "warn" | "error";

const LEVELS: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(value: string): value is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function resolveLevel(value: string | undefined): Level {
  const normalized = (value ?? "").toLowerCase();
  return isLevel(normalized) ? normalized : "info";
}

const threshold = LEVELS[resolveLevel(process.env.LOG_LEVEL)];

function write(level: Level, message: string, context?: Record<string, unknown>): void {
  if (LEVELS[level] < threshold) return;
  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    msg: message,
    ...context,
  });
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const log = {
  debug: (message: string, context?: Record<string, unknown>) => write("debug", message, context),
  info: (message: string, context?: Record<string, unknown>) => write("info", message, context),
  warn: (message: string, context?: Record<string, unknown>) => write("warn", message, context),
  error: (message: string, context?: Record<string, unknown>) => write("error", message, context),
};

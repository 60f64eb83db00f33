export type LogLevel = "debug" | "info" | "warn" | "error";

type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let sinkOverride: LogSink | null = null;

function thresholdFromEnv(): LogLevel {
  const raw = String(process.env.SKILL_INDEX_LOG_LEVEL ?? "")
    .trim()
    .toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") return raw;
  return "info";
}

function consoleSink(level: LogLevel, line: string) {
  switch (level) {
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
    default:
      console.info(line);
  }
}

export function logEvent(
  level: LogLevel,
  event: string,
  fields?: Record<string, unknown>
) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[thresholdFromEnv()]) return;

  const payload = {
    ts: new Date().toISOString(),
    level,
    event,
    ...(fields ?? {}),
  };

  const line = JSON.stringify(payload);
  (sinkOverride ?? consoleSink)(level, line);
}

export function _setLogSinkForTests(sink: LogSink | null) {
  sinkOverride = sink;
}

/**
 * Structured scene logging with deterministic IDs.
 * - JSON-first events (one object per event, suitable for log shippers & local dev)
 * - Deterministic event_id derived from stable hash of inputs
 * - Level threshold + pluggable sink; never throws
 */
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export type LogPayload = Record<string, unknown>;

export interface LogEvent {
  event_id: string;
  ts: string;
  level: LogLevel;
  service: "isa-flow";
  name: string;
  payload: LogPayload;
}

export type LogSink = (event: LogEvent) => void;

const LEVEL_RANK: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

/** Simple, deterministic FNV-1a hash to hex (stable across runs). */
export function fnv1aHex(str: string): string {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h += (h << 1) + (h << 4) + (h << 7) + (h << 8) + (h << 24);
  }
  // convert to unsigned and hex
  return (h >>> 0).toString(16).padStart(8, "0");
}

/** Build a deterministic id from event name + salient fields. */
export function deterministicId(name: string, payload: LogPayload): string {
  try {
    const key = JSON.stringify({
      name,
      // salient payload bits (section, step, handle)
      section: payload.section ?? null,
      step: payload.step ?? null,
      handle: payload.handle ?? null,
    });
    return `${fnv1aHex(name)}_${fnv1aHex(key)}`;
  } catch {
    // never throw from logger
    return `${fnv1aHex(name)}_${fnv1aHex(String(Date.now()))}`;
  }
}

function defaultLevel(): LogLevel {
  return process.env.NODE_ENV === "test" ? "WARN" : "INFO";
}

const consoleSink: LogSink = (event) => {
  // eslint-disable-next-line no-console
  const write = event.level === "ERROR" ? console.error : event.level === "WARN" ? console.warn : console.log;
  if (process.env.NODE_ENV !== "production") {
    write("[isa.event]", event);
  } else {
    // compact line in production to keep noise down
    write("[isa.event]", JSON.stringify(event));
  }
};

let threshold: LogLevel = defaultLevel();
let sink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Install a sink (tests, host applications). Returns a function restoring the previous one. */
export function setLogSink(next: LogSink): () => void {
  const prev = sink;
  sink = next;
  return () => {
    sink = prev;
  };
}

/** Core logging function. Returns the event id, even when the event is filtered out. */
export function logEvent(name: string, payload: LogPayload = {}, level: LogLevel = "INFO"): string {
  const event_id = deterministicId(name, payload);
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return event_id;

  const event: LogEvent = {
    event_id,
    ts: new Date().toISOString(),
    level,
    service: "isa-flow",
    name,
    payload,
  };
  try {
    sink(event);
  } catch (err) {
    // fall back to the console so the event is not lost
    consoleSink({ ...event, level: "ERROR", payload: { ...payload, sink_error: String(err) } });
  }
  return event_id;
}

export const logDebug = (name: string, payload?: LogPayload) => logEvent(name, payload, "DEBUG");
export const logWarn = (name: string, payload?: LogPayload) => logEvent(name, payload, "WARN");
export const logError = (name: string, payload?: LogPayload) => logEvent(name, payload, "ERROR");

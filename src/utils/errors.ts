export type IsaFlowErrorCode =
  | "InvalidArgument"
  | "PredecessorDeadlock"
  | "UnknownItem"
  | "InvalidConfig";

/** Base class of every error raised while a scene is being constructed. */
export class IsaFlowError extends Error {
  readonly code: IsaFlowErrorCode;
  readonly detail?: unknown;

  constructor(code: IsaFlowErrorCode, message: string, detail?: unknown) {
    super(message);
    this.name = code;
    this.code = code;
    this.detail = detail;
  }
}

export class InvalidArgumentError extends IsaFlowError {
  constructor(message: string, detail?: unknown) {
    super("InvalidArgument", message, detail);
  }
}

/** A cycle in the declared data flow; `blocked` lists the ids of the animations left unscheduled. */
export class PredecessorDeadlockError extends IsaFlowError {
  readonly section: number;
  readonly blocked: number[];

  constructor(section: number, blocked: number[]) {
    super(
      "PredecessorDeadlock",
      `Predecessor deadlock in section ${section}: animations ${blocked.join(", ")} never become ready`,
      { section, blocked },
    );
    this.section = section;
    this.blocked = blocked;
  }
}

export class UnknownItemError extends IsaFlowError {
  constructor(key: string | number) {
    super("UnknownItem", `No placed item with key ${String(key)}`, { key });
  }
}

export class InvalidConfigError extends IsaFlowError {
  constructor(message: string, detail?: unknown) {
    super("InvalidConfig", message, detail);
  }
}

export function isIsaFlowError(raw: unknown): raw is IsaFlowError {
  return raw instanceof IsaFlowError;
}

/** One-line message for any thrown value. */
export function normalizeErrorMessage(raw: unknown): string {
  if (isIsaFlowError(raw)) {
    const detailPart = raw.detail != null ? safeJson(raw.detail) : "";
    return `${raw.code}: ${raw.message}${detailPart ? " | " + detailPart : ""}`;
  }
  // Prefer structured Error-like objects next
  if (raw instanceof Error) {
    const name = raw.name || "Error";
    return raw.message ? `${name}: ${raw.message}` : name;
  }
  if (raw && typeof raw === "object") {
    const message = pickFirstString(raw, ["message", "detail", "error"]);
    if (message) return message;
    return safeJson(raw);
  }
  return String(raw ?? "");
}

// ──────────────────────────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────────────────────────

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

function pickFirstString(obj: object, keys: string[]): string | undefined {
  for (const k of keys) {
    const v: unknown = Reflect.get(obj, k);
    if (typeof v === "string" && v) return v;
  }
  return undefined;
}

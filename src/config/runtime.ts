import { SceneConfig, type SceneConfigInput } from "./schema";
import { InvalidConfigError } from "../utils/errors";

/**
 * Build the scene configuration once, at process start, and hand the result to the scene,
 * its data flow and the widgets. Validates shape; unknown keys are rejected.
 */
export function createSceneConfig(overrides: SceneConfigInput = {}): Readonly<SceneConfig> {
  const parsed = SceneConfig.strict().safeParse(overrides);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new InvalidConfigError(`Scene config invalid: ${issues.join("; ")}`, { issues });
  }
  return deepFreeze(parsed.data);
}

/** Render an element value with the configured format string. */
export function formatValue(config: Pick<SceneConfig, "elemValueFormat">, value: number | bigint | string): string {
  if (typeof value === "string") return value;
  const whole = typeof value === "bigint" ? value : Math.trunc(value);
  const digits = (radix: number) => whole.toString(radix);
  switch (config.elemValueFormat) {
    case "{:d}":
      return digits(10);
    case "{:x}":
      return digits(16);
    case "{:#x}":
      return `0x${digits(16)}`;
    case "{:b}":
      return digits(2);
    default: {
      const exhaustiveCheck: never = config.elemValueFormat;
      throw new InvalidConfigError(`Unknown value format ${String(exhaustiveCheck)}`);
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

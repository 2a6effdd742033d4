import { describe, test, expect } from "vitest";
import { createSceneConfig, formatValue } from "../config/runtime";
import { DEFAULT_COLOR_SCHEME } from "../config/schema";
import { InvalidConfigError } from "../utils/errors";

describe("createSceneConfig", () => {
  test("fills every default", () => {
    const config = createSceneConfig();
    expect(config.sceneRatio).toBe(0.125);
    expect(config.frameWidth).toBe(16);
    expect(config.frameHeight).toBe(9);
    expect(config.placementStrategy).toBe("RB");
    expect(config.memAddrWidth).toBe(64);
    expect(config.memDataWidth).toBe(128);
    expect(config.memRange).toEqual([[0n, 0x1000n]]);
    expect(config.memAlign).toBe(64);
    expect(config.elemValueFormat).toBe("{:d}");
    expect(config.colorScheme).toEqual([...DEFAULT_COLOR_SCHEME]);
    expect(config.zoomedDisplay).toEqual({ width: 16, height: 7 });
  });

  test("applies overrides", () => {
    const config = createSceneConfig({ placementStrategy: "BR", frameWidth: 20, zoomedDisplay: { height: 9 } });
    expect(config.placementStrategy).toBe("BR");
    expect(config.frameWidth).toBe(20);
    expect(config.zoomedDisplay).toEqual({ width: 16, height: 9 });
  });

  test("memory ranges hold exact 64-bit addresses", () => {
    const base = 2n ** 60n;
    expect(createSceneConfig({ memRange: [[base, base + 0x1000n]] }).memRange).toEqual([[base, base + 0x1000n]]);
    expect(createSceneConfig({ memRange: [[0x100, 0x200]] }).memRange).toEqual([[0x100n, 0x200n]]);
    expect(() => createSceneConfig({ memRange: [[2 ** 60, 2 ** 60 + 0x1000]] })).toThrow(/memRange\.0\.0/);
  });

  test("returns a frozen object", () => {
    const config = createSceneConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.memRange)).toBe(true);
  });

  test("rejects invalid values with the offending path", () => {
    expect(() => createSceneConfig({ frameWidth: -1 })).toThrow(InvalidConfigError);
    expect(() => createSceneConfig({ frameWidth: -1 })).toThrow(/frameWidth/);
    expect(() => createSceneConfig({ memRange: [[16, 8]] })).toThrow(/memRange\.0/);
    expect(() => createSceneConfig({ colorScheme: ["red"] })).toThrow(/expected #RRGGBB/);
  });

  test("rejects unknown keys", () => {
    const overrides = { frameWidth: 16, frameDepth: 3 };
    expect(() => createSceneConfig(overrides)).toThrow(InvalidConfigError);
    expect(() => createSceneConfig(overrides)).toThrow(/frameDepth/);
  });
});

describe("formatValue", () => {
  test.each([
    ["{:d}", "255"],
    ["{:x}", "ff"],
    ["{:#x}", "0xff"],
    ["{:b}", "11111111"],
  ] as const)("%s renders 255 as %s", (elemValueFormat, expected) => {
    expect(formatValue({ elemValueFormat }, 255)).toBe(expected);
  });

  test("renders bigint values without rounding", () => {
    expect(formatValue({ elemValueFormat: "{:#x}" }, 2n ** 60n + 8n)).toBe("0x1000000000000008");
    expect(formatValue({ elemValueFormat: "{:d}" }, 2n ** 60n + 1n)).toBe("1152921504606846977");
  });

  test("passes strings through", () => {
    expect(formatValue({ elemValueFormat: "{:x}" }, "a+b")).toBe("a+b");
  });
});

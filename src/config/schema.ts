import { z } from "zod";

// Default palette, cycled by the colour map (red, blue, green, yellow, teal, purple, maroon)
export const DEFAULT_COLOR_SCHEME = [
  "#FC6255",
  "#58C4DD",
  "#83C167",
  "#FFFF00",
  "#5CD0B3",
  "#9A72AC",
  "#C55F73",
] as const;

const HexColor = z.string().regex(/^#[0-9a-fA-F]{6}$/, "expected #RRGGBB");

export const PlacementStrategy = z.enum(["RB", "BR"]);
export type PlacementStrategy = z.infer<typeof PlacementStrategy>;

// Addresses are 64-bit; plain numbers are taken only while they are exact.
export const MemAddress = z.union([
  z.bigint().nonnegative(),
  z
    .number()
    .int()
    .nonnegative()
    .refine(Number.isSafeInteger, { message: "addresses above 2^53 must be given as bigint" })
    .transform((n) => BigInt(n)),
]);

export const MemRange = z
  .tuple([MemAddress, MemAddress])
  .refine(([lo, hi]) => lo < hi, { message: "memory range must be [lo, hi) with lo < hi" });

export const ZoomedDisplay = z.object({
  width: z.number().positive().default(16),
  height: z.number().positive().default(7),
});

export const SceneConfig = z.object({
  // scene width per bit; 1/8 means one unit holds 8 bits
  sceneRatio: z.number().positive().default(1 / 8),
  frameWidth: z.number().int().positive().default(16),
  frameHeight: z.number().int().positive().default(9),
  placementStrategy: PlacementStrategy.default("RB"),
  memAddrWidth: z.number().int().positive().default(64),
  memDataWidth: z.number().int().positive().default(128),
  memRange: z.array(MemRange).min(1).default([[0, 0x1000]]),
  memAlign: z.number().int().positive().default(64),
  elemFillOpacity: z.number().min(0).max(1).default(0.5),
  elemValueFormat: z.enum(["{:d}", "{:x}", "{:#x}", "{:b}"]).default("{:d}"),
  defaultColor: HexColor.default("#FFFFFF"),
  colorScheme: z.array(HexColor).min(1).default([...DEFAULT_COLOR_SCHEME]),
  zoomedDisplay: ZoomedDisplay.default({}),
});
export type SceneConfig = z.infer<typeof SceneConfig>;
export type SceneConfigInput = z.input<typeof SceneConfig>;

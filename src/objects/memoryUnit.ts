import type { SceneConfig } from "../config/schema";
import type { Decorated, Placeable, Point, VisualItem } from "../types/isa";
import { MARK_MEMORY } from "../types/isa";
import { InvalidArgumentError } from "../utils/errors";
import { nextHandle } from "../utils/handles";
import { MarkUnit } from "./mark";

export type Address = number | bigint;

/** Exact 64-bit address; a number must be a safe non-negative integer. */
export function toAddress(value: Address): bigint {
  if (typeof value === "bigint") {
    if (value < 0n) throw new InvalidArgumentError(`Address ${value} is negative`);
    return value;
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`Address ${value} is not exact; pass it as a bigint`);
  }
  return BigInt(value);
}

export interface MemoryOptions {
  color: string;
  addrWidth?: number;
  dataWidth?: number;
  /** 0 means no status port. */
  statusWidth?: number;
  addrAlign?: number;
  ranges?: ReadonlyArray<readonly [Address, Address]>;
  /** Accesses may overlap in time; otherwise they are serialized. */
  parallel?: boolean;
  /** Lower bound for the width of the memory map bars. */
  mapWidthHint?: number;
}

// Memory body is a 4 x 3 box; address port on its left, data port on its right.
const BODY_WIDTH = 4;
const PORT_GAP = 1;

/**
 * Memory unit with address, data and optional status ports above one bar per address range.
 * Marks created on the bars stay attached to the unit.
 */
export class MemoryUnit implements VisualItem, Placeable, Decorated {
  readonly handle = nextHandle();
  readonly kind = "memory" as const;
  readonly requireSerialization: boolean;
  position: Point = { x: 0, y: 0 };

  readonly color: string;
  readonly addrWidth: number;
  readonly dataWidth: number;
  readonly statusWidth: number;
  readonly addrAlign: number;
  readonly ranges: ReadonlyArray<readonly [bigint, bigint]>;
  readonly mapWidth: number;
  readonly marks: MarkUnit[] = [];

  private row = 0;
  private col = 0;

  constructor(private readonly config: Readonly<SceneConfig>, options: MemoryOptions) {
    this.color = options.color;
    this.addrWidth = options.addrWidth ?? config.memAddrWidth;
    this.dataWidth = options.dataWidth ?? config.memDataWidth;
    this.statusWidth = options.statusWidth ?? 0;
    this.addrAlign = options.addrAlign ?? config.memAlign;
    this.requireSerialization = !(options.parallel ?? false);

    if (!(this.addrWidth > 0) || !(this.dataWidth > 0) || this.statusWidth < 0) {
      throw new InvalidArgumentError("Memory port widths must be positive");
    }
    if (!Number.isInteger(this.addrAlign) || this.addrAlign <= 0) {
      throw new InvalidArgumentError(`Memory alignment must be a positive integer, got ${this.addrAlign}`);
    }
    const ranges: ReadonlyArray<readonly [Address, Address]> = options.ranges ?? config.memRange;
    if (ranges.length === 0) throw new InvalidArgumentError("Memory needs at least one address range");
    const align = BigInt(this.addrAlign);
    this.ranges = ranges.map(([rawLo, rawHi]) => {
      const [lo, hi] = [toAddress(rawLo), toAddress(rawHi)];
      if (!(lo < hi)) throw new InvalidArgumentError(`Memory range [${lo}, ${hi}) is empty`);
      return [(lo / align) * align, ((hi + align - 1n) / align) * align] as const;
    });

    const widest = Math.max(this.addrWidth, this.dataWidth);
    this.mapWidth = Math.max((this.addrWidth + widest) * config.sceneRatio + BODY_WIDTH + 2 * PORT_GAP, options.mapWidthHint ?? 0);
  }

  get hasStatusPort(): boolean {
    return this.statusWidth > 0;
  }

  /** Index of the range holding `addr`, or -1. */
  rangeIndexOf(addr: Address): number {
    const at = toAddress(addr);
    return this.ranges.findIndex(([lo, hi]) => lo <= at && at < hi);
  }

  isRangeCover(addr: Address): boolean {
    return this.rangeIndexOf(addr) >= 0;
  }

  getAddrPos(width = this.addrWidth): Point {
    return { x: this.addrRight - (width * this.config.sceneRatio) / 2, y: this.position.y };
  }

  getDataPos(width = this.dataWidth): Point {
    return { x: this.dataRight - (width * this.config.sceneRatio) / 2, y: this.position.y };
  }

  getStatusPos(width = this.statusWidth): Point {
    const right = this.position.x + (this.statusWidth * this.config.sceneRatio) / 2;
    return { x: right - (width * this.config.sceneRatio) / 2, y: this.position.y + 0.5 };
  }

  /** Triangle pointing at `addr` on its range bar. */
  getAddrMark(addr: Address, color: string): MarkUnit {
    const at = toAddress(addr);
    const { idx, scale, right, y } = this.bar(at);
    const offset = Number(at - this.ranges[idx][0]) + 0.5;
    return this.attach(
      new MarkUnit({ shape: "triangle", color, width: 0.4, height: 0.4, position: { x: right - offset * scale, y: y - 0.6 } }),
    );
  }

  /** Thin band over `[lo, hi)` in the upper third of the bar. */
  getReadMark(lo: Address, hi: Address, color: string): MarkUnit {
    return this.rangeMark(lo, hi, color, 0.34, -0.33, 0.25);
  }

  /** Wide band over `[lo, hi)` in the lower two thirds of the bar. */
  getWriteMark(lo: Address, hi: Address, color: string): MarkUnit {
    return this.rangeMark(lo, hi, color, 0.66, 0.17, this.config.elemFillOpacity);
  }

  attachedItems(): VisualItem[] {
    return [...this.marks];
  }

  getPlacementWidth(): number {
    return Math.ceil(this.mapWidth + 2);
  }

  getPlacementHeight(): number {
    return 4 + 2 * this.ranges.length;
  }

  getPlacementMarker(): number {
    return MARK_MEMORY;
  }

  setPlacementCorner(row: number, col: number): void {
    this.row = row;
    this.col = col;
    const addrRectWidth = this.addrWidth * this.config.sceneRatio;
    this.position = { x: col + 1 + addrRectWidth + PORT_GAP + BODY_WIDTH / 2, y: row + 1.5 };
  }

  clone(): MemoryUnit {
    const copy = new MemoryUnit(this.config, {
      color: this.color,
      addrWidth: this.addrWidth,
      dataWidth: this.dataWidth,
      statusWidth: this.statusWidth,
      addrAlign: this.addrAlign,
      ranges: this.ranges,
      parallel: !this.requireSerialization,
      mapWidthHint: this.mapWidth,
    });
    copy.setPlacementCorner(this.row, this.col);
    return copy;
  }

  toString(): string {
    return `Memory_${this.addrWidth}b_${this.dataWidth}b`;
  }

  // ─── Helpers ───

  private get addrRight(): number {
    return this.position.x - BODY_WIDTH / 2 - PORT_GAP;
  }

  private get dataRight(): number {
    return this.position.x + BODY_WIDTH / 2 + PORT_GAP + this.dataWidth * this.config.sceneRatio;
  }

  private bar(addr: bigint): { idx: number; scale: number; right: number; y: number } {
    const idx = this.rangeIndexOf(addr);
    if (idx < 0) throw new InvalidArgumentError(`Address 0x${addr.toString(16)} outside every memory range`);
    const [lo, hi] = this.ranges[idx];
    const left = this.addrRight - this.addrWidth * this.config.sceneRatio;
    return { idx, scale: this.mapWidth / Number(hi - lo), right: left + this.mapWidth, y: this.position.y + 3 + 2 * idx };
  }

  private rangeMark(rawLo: Address, rawHi: Address, color: string, height: number, dy: number, fillOpacity: number): MarkUnit {
    const [lo, hi] = [toAddress(rawLo), toAddress(rawHi)];
    if (!(lo < hi)) throw new InvalidArgumentError(`Memory mark range [${lo}, ${hi}) is empty`);
    const { idx, scale, right, y } = this.bar(lo);
    const [rangeLo, rangeHi] = this.ranges[idx];
    // offsets from the range base, not absolute addresses
    const span = Number((hi < rangeHi ? hi : rangeHi) - lo);
    const centre = right - (Number(lo - rangeLo) + span / 2) * scale;
    return this.attach(
      new MarkUnit({ shape: "rect", color, width: span * scale, height, fillOpacity, position: { x: centre, y: y + dy } }),
    );
  }

  private attach(mark: MarkUnit): MarkUnit {
    this.marks.push(mark);
    return mark;
  }
}

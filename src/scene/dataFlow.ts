/**
 * scene/dataFlow.ts
 * Declarative data-flow operations. Each one places the units it declares, asks the tracker
 * whether consumed elements must be duplicated, builds the animation and registers it with the
 * flow together with its source, destination and background items.
 */
import * as functionAnim from "../animate/functionAnimate";
import * as memoryAnim from "../animate/memoryAnimate";
import * as registerAnim from "../animate/registerAnimate";
import type { RegisterAlign } from "../animate/registerAnimate";
import { createSceneConfig } from "../config/runtime";
import type { SceneConfig } from "../config/schema";
import { AnimationFlow } from "../core/animationFlow";
import type { AnimationItem } from "../core/animationFlow";
import { ColorMap } from "../core/colorMap";
import { PlacementEngine } from "../core/placement";
import { RefCountTracker } from "../core/refcount";
import { ElementUnit } from "../objects/element";
import type { ElementValue } from "../objects/element";
import { FunctionUnit } from "../objects/functionUnit";
import type { MarkUnit } from "../objects/mark";
import { MemoryUnit, toAddress } from "../objects/memoryUnit";
import type { Address, MemoryOptions } from "../objects/memoryUnit";
import { RegisterUnit } from "../objects/register";
import type { ColorKey, PlacementKey, VisualItem } from "../types/isa";
import { InvalidArgumentError } from "../utils/errors";
import { logWarn } from "../utils/logger";

export interface PlaceOptions {
  key?: PlacementKey;
  alignWith?: PlacementKey | VisualItem;
  color?: string;
}

export interface DeclRegisterOptions extends PlaceOptions {
  values?: ElementValue[][];
}

export interface DeclGroupOptions {
  keys?: PlacementKey[];
  /** `[rows, cols]` of the block. */
  forceRatio?: [number, number];
  color?: string;
}

export interface LaneOptions {
  index?: number;
  regIdx?: number;
  /** Bits above the lane LSB. */
  offset?: number;
  /** Width in bits; defaults to one lane. */
  size?: number;
}

export interface ElementStyle {
  color?: string;
  colorKey?: ColorKey;
  value?: ElementValue;
}

export type ReadElemOptions = LaneOptions & ElementStyle;

export type AssignElemOptions = LaneOptions & Omit<ElementStyle, "colorKey">;

export interface ReplaceElemOptions extends ElementStyle {
  offset?: number;
}

export interface FunctionCallOptions {
  key?: PlacementKey;
  alignWith?: PlacementKey | VisualItem;
  argsOffset?: number[];
  resOffset?: number[];
  color?: string;
  colorKey?: ColorKey;
  values?: ElementValue[];
}

export interface ReadImmOptions {
  argIndex?: number;
  width?: number;
  color?: string;
  colorKey?: ColorKey;
}

export type DeclMemoryOptions = Omit<MemoryOptions, "color"> & PlaceOptions;

export interface MemoryAccessOptions {
  /** Address actually accessed; defaults to the address element's value. */
  address?: Address;
  size?: number;
  color?: string;
  colorKey?: ColorKey;
  value?: ElementValue;
  statusValue?: ElementValue;
}

export interface ReadMemoryResult {
  data: ElementUnit;
  status: ElementUnit | null;
}

const REGISTER_ALIGNS: readonly RegisterAlign[] = ["center", "left", "right"];

function isRegisterAlign(value: string): value is RegisterAlign {
  return REGISTER_ALIGNS.some((a) => a === value);
}

export class IsaDataFlow {
  readonly config: Readonly<SceneConfig>;
  readonly placement: PlacementEngine;
  readonly refcount = new RefCountTracker();
  readonly flow = new AnimationFlow();
  readonly colors: ColorMap;

  constructor(config: Readonly<SceneConfig> = createSceneConfig()) {
    this.config = config;
    this.placement = new PlacementEngine(config);
    this.colors = new ColorMap(config);
  }

  // ---- registers ----

  /** Declare a register; several names give one register with a row per name. */
  declRegister(names: string | string[], width: number, elements = 1, options: DeclRegisterOptions = {}): RegisterUnit {
    const reg = new RegisterUnit(this.config, {
      names,
      width,
      elements,
      color: options.color ?? this.colors.defaultColor,
      values: options.values,
    });
    this.placement.place(reg, options.key, options.alignWith);
    this.flow.addAnimation({ animation: registerAnim.declRegister(reg), dst: reg });
    return reg;
  }

  /** Declare one register per name, packed as one block. */
  declVectorGroup(names: string[], width: number, elements = 1, options: DeclGroupOptions = {}): RegisterUnit[] {
    if (names.length === 0) throw new InvalidArgumentError("A vector group needs at least one name");
    const color = options.color ?? this.colors.defaultColor;
    const regs = names.map((name) => new RegisterUnit(this.config, { names: name, width, elements, color }));
    this.placement.placeGroup(regs, options.keys, options.forceRatio);
    this.flow.addAnimation({ animation: registerAnim.declRegister(...regs), dst: regs });
    return regs;
  }

  /** Merge registers into a new, wider one. The first part becomes the low bits. */
  concatVector(parts: RegisterUnit[], name: string, options: PlaceOptions = {}): RegisterUnit {
    if (parts.length === 0) throw new InvalidArgumentError("Nothing to concatenate");
    const width = parts.reduce((acc, p) => acc + p.width, 0);
    const elemWidth = Math.min(...parts.map((p) => p.elemWidth));
    const merged = new RegisterUnit(this.config, {
      names: name,
      width,
      elements: Math.floor(width / elemWidth),
      color: options.color ?? this.colors.defaultColor,
    });
    this.placement.place(merged, options.key, options.alignWith);
    this.flow.addAnimation({ animation: registerAnim.concatVector(parts, merged), src: parts, dst: merged });
    return merged;
  }

  /** Replace a register in place by a new one aligned `center`, `left` or `right`. */
  replaceRegister(
    oldReg: RegisterUnit,
    names: string | string[],
    width: number,
    elements = 1,
    align: string = "center",
    color?: string,
  ): RegisterUnit {
    if (!isRegisterAlign(align)) {
      throw new InvalidArgumentError(`Register alignment must be center, left or right, got "${align}"`);
    }
    const next = new RegisterUnit(this.config, { names, width, elements, color: color ?? oldReg.color });
    this.flow.addAnimation({ animation: registerAnim.replaceRegister(oldReg, next, align), src: oldReg, dst: next });
    return next;
  }

  // ---- elements ----

  /** Read a lane; reading the same lane again in a section hands back the same element. */
  readElem(register: RegisterUnit, options: ReadElemOptions = {}): ElementUnit {
    const index = options.index ?? 0;
    const regIdx = options.regIdx ?? 0;
    const offset = options.offset ?? 0;
    const size = options.size ?? register.elemWidth;

    const known = this.refcount.findBySource({ register, regIdx, index, offset, width: size });
    if (known instanceof ElementUnit) return known;

    const elem = new ElementUnit(this.config, {
      width: size,
      color: options.color ?? this.colors.getColor(options.colorKey),
      value: options.value ?? register.getElemValue(index, regIdx),
    });
    this.flow.addAnimation({
      animation: registerAnim.readElem(register, elem, index, regIdx, offset),
      src: register,
      dst: elem,
      dep: register,
    });
    this.refcount.setProducer(elem, register);
    this.refcount.setSource(elem, { register, regIdx, index, offset, width: size });
    return elem;
  }

  /** Write an element into a register lane; returns the element now sitting on the lane. */
  assignElem(elem: ElementUnit, register: RegisterUnit, options: AssignElemOptions = {}): ElementUnit {
    const index = options.index ?? 0;
    const regIdx = options.regIdx ?? 0;
    const offset = options.offset ?? 0;

    const source = this.refcount.getDuplicate(elem);
    const placed = new ElementUnit(this.config, {
      width: options.size ?? elem.width,
      color: options.color ?? elem.color,
      value: options.value ?? elem.value,
    });
    const item = this.flow.addAnimation({
      animation: registerAnim.assignElem(source, placed, register, index, regIdx, offset),
      src: [source, register],
      dst: placed,
      dep: [...this.refcount.lastDeps(elem), register],
    });
    this.consumed([elem], item, register);
    this.refcount.setProducer(placed, register);
    const lane = { register, regIdx, index, offset, width: placed.width };
    this.refcount.invalidateLane(lane);
    this.refcount.setSource(placed, lane);
    return placed;
  }

  /** Move an element unchanged onto a register lane. */
  moveElem(elem: ElementUnit, register: RegisterUnit, options: LaneOptions = {}): ElementUnit {
    return this.assignElem(elem, register, { index: options.index, regIdx: options.regIdx, offset: options.offset });
  }

  /** Convert an element into a new one of `size` bits, right-aligned `offset` bits above its LSB. */
  replaceElem(elem: ElementUnit, size: number, options: ReplaceElemOptions = {}): ElementUnit {
    const source = this.refcount.getDuplicate(elem);
    const next = new ElementUnit(this.config, {
      width: size,
      color: options.color ?? this.colors.getColor(options.colorKey),
      value: options.value ?? elem.value,
    });
    const deps = this.refcount.lastDeps(elem);
    const item = this.flow.addAnimation({
      animation: registerAnim.replaceElem(source, next, options.offset ?? 0),
      src: source,
      dst: next,
      dep: deps,
    });
    this.consumed([elem], item, null);
    this.refcount.setProducer(next, deps[0] ?? null);
    return next;
  }

  // ---- functions ----

  /** Declare a function unit, or return the one already placed under the same key. */
  declFunction(name: string, argsWidth: number[], resWidth: number[], options: PlaceOptions = {}): FunctionUnit {
    const key = options.key ?? `${name}(${argsWidth.join(",")})->(${resWidth.join(",")})`;
    if (this.placement.has(key)) {
      const existing = this.placement.get(key);
      if (!(existing instanceof FunctionUnit)) {
        throw new InvalidArgumentError(`Placement key ${String(key)} does not hold a function unit`);
      }
      return existing;
    }
    const unit = new FunctionUnit(this.config, {
      name,
      argsWidth,
      resWidth,
      color: options.color ?? this.colors.defaultColor,
    });
    this.placement.place(unit, key, options.alignWith);
    this.flow.addAnimation({ animation: functionAnim.declFunction(unit), dst: unit });
    return unit;
  }

  /** Immediate operand created directly on an argument port. */
  readImm(unit: FunctionUnit, value: ElementValue, options: ReadImmOptions = {}): ElementUnit {
    const argIndex = options.argIndex ?? 0;
    const elem = new ElementUnit(this.config, {
      width: options.width ?? unit.argsWidth[argIndex] ?? 8,
      color: options.color ?? this.colors.getColor(options.colorKey),
      value,
    });
    this.flow.addAnimation({ animation: functionAnim.readImm(unit, elem, argIndex), dst: elem, dep: unit });
    this.refcount.setProducer(elem, unit);
    return elem;
  }

  /** Call a function; the unit is declared and placed on first use. */
  functionCall(name: string, args: ElementUnit[], resWidth: number, options?: FunctionCallOptions): ElementUnit;
  functionCall(name: string, args: ElementUnit[], resWidth: number[], options?: FunctionCallOptions): ElementUnit[];
  functionCall(
    name: string,
    args: ElementUnit[],
    resWidth: number | number[],
    options: FunctionCallOptions = {},
  ): ElementUnit | ElementUnit[] {
    const widths = Array.isArray(resWidth) ? resWidth : [resWidth];
    const unit = this.declFunction(
      name,
      args.map((a) => a.width),
      widths,
      { key: options.key, alignWith: options.alignWith },
    );

    const sources = args.map((a) => this.refcount.getDuplicate(a));
    const fixedColor = options.color;
    const colors = fixedColor
      ? widths.map(() => fixedColor)
      : this.colors.getColors(options.colorKey ?? this.colors.nextTag(), widths.length);
    const results = widths.map(
      (width, i) => new ElementUnit(this.config, { width, color: colors[i], value: options.values?.[i] }),
    );

    const item = this.flow.addAnimation({
      animation: functionAnim.functionCall(unit, sources, results, options.argsOffset, options.resOffset),
      src: [...sources, unit],
      dst: results,
      dep: [...this.refcount.lastDeps(...args), unit],
    });
    this.consumed(args, item, unit);
    for (const res of results) this.refcount.setProducer(res, unit);

    return Array.isArray(resWidth) ? results : results[0];
  }

  // ---- memory ----

  declMemory(options: DeclMemoryOptions = {}): MemoryUnit {
    const { key, alignWith, color, ...memoryOptions } = options;
    const memory = new MemoryUnit(this.config, { ...memoryOptions, color: color ?? this.colors.defaultColor });
    this.placement.place(memory, key, alignWith);
    this.flow.addAnimation({ animation: memoryAnim.declMemory(memory), dst: memory });
    return memory;
  }

  /** Read `size` bits at the address held by `addr` (or `options.address`). */
  readMemory(memory: MemoryUnit, addr: ElementUnit, options: MemoryAccessOptions = {}): ReadMemoryResult {
    const size = options.size ?? memory.dataWidth;
    const source = this.refcount.getDuplicate(addr);
    const data = new ElementUnit(this.config, {
      width: size,
      color: options.color ?? this.colors.getColor(options.colorKey),
      value: options.value,
    });
    const status = this.statusElement(memory, data.color, options.statusValue);
    const access = { memory, addr: source, data, status };

    const marks = this.marksFor(memory, addr, size, data.color, options.address, "read");
    const animation = marks ? memoryAnim.readMemory(access, marks) : memoryAnim.readMemoryWithoutAddr(access);

    const item = this.flow.addAnimation({
      animation,
      src: [source, memory],
      dst: [data, status, marks?.addrMark, marks?.memMark],
      dep: [...this.refcount.lastDeps(addr), memory],
    });
    this.consumed([addr], item, memory);
    this.refcount.setProducer(data, memory);
    if (status) this.refcount.setProducer(status, memory);
    return { data, status };
  }

  /** Write `data` at the address held by `addr` (or `options.address`); returns the status element. */
  writeMemory(memory: MemoryUnit, addr: ElementUnit, data: ElementUnit, options: MemoryAccessOptions = {}): ElementUnit | null {
    const size = options.size ?? data.width;
    const addrSource = this.refcount.getDuplicate(addr);
    const dataSource = this.refcount.getDuplicate(data);
    const status = this.statusElement(memory, data.color, options.statusValue);
    const access = { memory, addr: addrSource, data: dataSource, status };

    const marks = this.marksFor(memory, addr, size, data.color, options.address, "write");
    const animation = marks ? memoryAnim.writeMemory(access, marks) : memoryAnim.writeMemoryWithoutAddr(access);

    const item = this.flow.addAnimation({
      animation,
      src: [addrSource, dataSource, memory],
      dst: [status, marks?.addrMark, marks?.memMark],
      dep: [...this.refcount.lastDeps(addr, data), memory],
    });
    this.consumed([addr, data], item, memory);
    if (status) this.refcount.setProducer(status, memory);
    return status;
  }

  // ─── Helpers ───

  private consumed(items: VisualItem[], consumer: AnimationItem, dep: VisualItem | null): void {
    for (const item of items) this.refcount.setConsumer(item, consumer, dep);
  }

  private statusElement(memory: MemoryUnit, color: string, value?: ElementValue): ElementUnit | null {
    if (!memory.hasStatusPort) return null;
    return new ElementUnit(this.config, { width: memory.statusWidth, color, value });
  }

  /** Address and range marks, or null when the address is unknown or outside every range. */
  private marksFor(
    memory: MemoryUnit,
    addr: ElementUnit,
    size: number,
    color: string,
    explicit: Address | undefined,
    mode: "read" | "write",
  ): { addrMark: MarkUnit; memMark: MarkUnit; addrMatch: boolean } | null {
    const held = heldAddress(addr.value);
    const address = explicit === undefined ? held : toAddress(explicit);
    if (address === undefined) return null;
    if (!memory.isRangeCover(address)) {
      logWarn("memory.address.uncovered", { handle: memory.handle, address: `0x${address.toString(16)}`, mode });
      return null;
    }

    const end = address + BigInt(Math.max(1, Math.ceil(size / 8)));
    const addrMark = memory.getAddrMark(address, addr.color);
    const memMark = mode === "read" ? memory.getReadMark(address, end, color) : memory.getWriteMark(address, end, color);
    return { addrMark, memMark, addrMatch: held === address };
  }
}

/** Address held by an element value; strings and inexact numbers hold none. */
function heldAddress(value: ElementValue | undefined): bigint | undefined {
  if (typeof value === "bigint") return value >= 0n ? value : undefined;
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  return undefined;
}

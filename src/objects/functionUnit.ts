import type { SceneConfig } from "../config/schema";
import type { Placeable, Point, VisualItem } from "../types/isa";
import { MARK_FUNCTION } from "../types/isa";
import { InvalidArgumentError } from "../utils/errors";
import { nextHandle } from "../utils/handles";

export interface FunctionOptions {
  name: string;
  /** Bit width of each argument port, left to right. */
  argsWidth: number[];
  /** Bit width of each result port, left to right. */
  resWidth: number[];
  color: string;
  argsName?: string[];
  resName?: string[];
}

/**
 * Function unit: argument ports on the top row, result ports on the bottom row of a five-row box.
 * Animations through one unit play one after another.
 */
export class FunctionUnit implements VisualItem, Placeable {
  readonly handle = nextHandle();
  readonly kind = "function" as const;
  readonly requireSerialization = true;
  position: Point = { x: 0, y: 0 };

  readonly name: string;
  readonly argsWidth: number[];
  readonly resWidth: number[];
  readonly argsName: string[];
  readonly resName: string[];
  readonly color: string;

  private row = 0;
  private col = 0;

  constructor(private readonly config: Readonly<SceneConfig>, options: FunctionOptions) {
    if (options.resWidth.length === 0) {
      throw new InvalidArgumentError(`Function ${options.name} needs at least one result`);
    }
    for (const w of [...options.argsWidth, ...options.resWidth]) {
      if (!(w > 0)) throw new InvalidArgumentError(`Function ${options.name} has a port of width ${w}`);
    }
    this.name = options.name;
    this.argsWidth = [...options.argsWidth];
    this.resWidth = [...options.resWidth];
    this.argsName = options.argsName ?? this.argsWidth.map(() => "");
    this.resName = options.resName ?? this.resWidth.map(() => "");
    this.color = options.color;
  }

  get rectWidth(): number {
    return Math.max(1, Math.ceil(Math.max(this.span(this.argsWidth), this.span(this.resWidth))));
  }

  /** Centre of the field `elemWidth` bits wide, `offset` bits above the LSB of argument `index`. */
  getArgPos(index: number, offset = 0, elemWidth?: number): Point {
    const widths = this.argsWidth;
    if (!Number.isInteger(index) || index < 0 || index >= widths.length) {
      throw new InvalidArgumentError(`Function ${this.name} has no argument ${index}`);
    }
    return {
      x: this.portRight(widths, index) - (offset + (elemWidth ?? widths[index]) / 2) * this.config.sceneRatio,
      y: this.row + 0.5,
    };
  }

  getResPos(index: number, offset = 0, elemWidth?: number): Point {
    const widths = this.resWidth;
    if (!Number.isInteger(index) || index < 0 || index >= widths.length) {
      throw new InvalidArgumentError(`Function ${this.name} has no result ${index}`);
    }
    return {
      x: this.portRight(widths, index) - (offset + (elemWidth ?? widths[index]) / 2) * this.config.sceneRatio,
      y: this.row + 4.5,
    };
  }

  getPlacementWidth(): number {
    return this.rectWidth;
  }

  getPlacementHeight(): number {
    return 5;
  }

  getPlacementMarker(): number {
    return MARK_FUNCTION;
  }

  setPlacementCorner(row: number, col: number): void {
    this.row = row;
    this.col = col;
    this.position = { x: col + this.rectWidth / 2, y: row + 2.5 };
  }

  clone(): FunctionUnit {
    const copy = new FunctionUnit(this.config, {
      name: this.name,
      argsWidth: this.argsWidth,
      resWidth: this.resWidth,
      argsName: this.argsName,
      resName: this.resName,
      color: this.color,
    });
    copy.setPlacementCorner(this.row, this.col);
    return copy;
  }

  toString(): string {
    const args = this.argsWidth.map((w) => `${w}b`).join(",");
    const res = this.resWidth.map((w) => `${w}b`).join(",");
    return `Func_${this.name}(${args})->(${res})`;
  }

  // ports sit side by side with a one-unit gap, centred on the unit
  private span(widths: number[]): number {
    if (widths.length === 0) return 0;
    return widths.reduce((acc, w) => acc + w * this.config.sceneRatio, 0) + widths.length - 1;
  }

  private portRight(widths: number[], index: number): number {
    const left = this.position.x - this.span(widths) / 2;
    const before = widths.slice(0, index).reduce((acc, w) => acc + w * this.config.sceneRatio, 0);
    return left + before + index + widths[index] * this.config.sceneRatio;
  }
}

import type { SceneConfig } from "../config/schema";
import { formatValue } from "../config/runtime";
import type { Placeable, Point, VisualItem } from "../types/isa";
import { MARK_REGISTER } from "../types/isa";
import { InvalidArgumentError } from "../utils/errors";
import { nextHandle } from "../utils/handles";

export type ElementValue = number | bigint | string;

export interface ElementOptions {
  /** Width in bits. */
  width: number;
  color: string;
  value?: ElementValue;
  label?: string;
}

/** One data element moving between registers, function ports and memory. */
export class ElementUnit implements VisualItem, Placeable {
  readonly handle = nextHandle();
  readonly kind = "element" as const;
  readonly requireSerialization = false;
  position: Point = { x: 0, y: 0 };

  readonly width: number;
  readonly color: string;
  readonly value?: ElementValue;
  readonly label?: string;

  constructor(private readonly config: Readonly<SceneConfig>, options: ElementOptions) {
    if (!(options.width > 0)) throw new InvalidArgumentError(`Element width must be positive, got ${options.width}`);
    this.width = options.width;
    this.color = options.color;
    this.value = options.value;
    this.label = options.label;
  }

  get rectWidth(): number {
    return this.width * this.config.sceneRatio;
  }

  /** Text shown inside the element. */
  get text(): string {
    if (this.value === undefined) return this.label ?? "";
    return formatValue(this.config, this.value);
  }

  moveTo(target: Point): this {
    this.position = { ...target };
    return this;
  }

  /** Centre of a sub-field `offset` bits above the LSB, `width` bits wide. */
  getElemPos(offset: number, width: number): Point {
    const right = this.position.x + this.rectWidth / 2;
    return { x: right - (offset + width / 2) * this.config.sceneRatio, y: this.position.y };
  }

  clone(): ElementUnit {
    const copy = new ElementUnit(this.config, {
      width: this.width,
      color: this.color,
      value: this.value,
      label: this.label,
    });
    return copy.moveTo(this.position);
  }

  getPlacementWidth(): number {
    return Math.ceil(this.rectWidth);
  }

  getPlacementHeight(): number {
    return 1;
  }

  getPlacementMarker(): number {
    return MARK_REGISTER;
  }

  setPlacementCorner(row: number, col: number): void {
    this.position = { x: col + this.getPlacementWidth() / 2, y: row + 0.5 };
  }

  toString(): string {
    return `Elem_${this.width}b(${this.text})`;
  }
}

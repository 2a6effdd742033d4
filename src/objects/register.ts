import type { SceneConfig } from "../config/schema";
import type { Placeable, Point, VisualItem } from "../types/isa";
import { MARK_REGISTER } from "../types/isa";
import { InvalidArgumentError } from "../utils/errors";
import { nextHandle } from "../utils/handles";
import type { ElementValue } from "./element";

export interface RegisterOptions {
  /** One name per row; a single name gives a one-row register. */
  names: string | string[];
  /** Width of each row in bits. */
  width: number;
  /** Lanes per row. */
  elements?: number;
  color: string;
  /** Row-major lane values, `values[regIdx][index]`. */
  values?: ElementValue[][];
}

/**
 * Vector register, one or more rows of equally wide lanes. Lane 0 sits at the right edge; the
 * name label sits on the left.
 */
export class RegisterUnit implements VisualItem, Placeable {
  readonly handle = nextHandle();
  readonly kind = "register" as const;
  readonly requireSerialization = false;
  position: Point = { x: 0, y: 0 };

  readonly names: string[];
  readonly width: number;
  readonly elements: number;
  readonly color: string;
  readonly values: ElementValue[][];

  private row = 0;
  private col = 0;

  constructor(private readonly config: Readonly<SceneConfig>, options: RegisterOptions) {
    const names = Array.isArray(options.names) ? [...options.names] : [options.names];
    const elements = options.elements ?? 1;
    if (names.length === 0) throw new InvalidArgumentError("A register needs at least one name");
    if (!(options.width > 0)) throw new InvalidArgumentError(`Register width must be positive, got ${options.width}`);
    if (!Number.isInteger(elements) || elements <= 0) {
      throw new InvalidArgumentError(`Register lane count must be a positive integer, got ${elements}`);
    }
    this.names = names;
    this.width = options.width;
    this.elements = elements;
    this.color = options.color;
    this.values = (options.values ?? []).map((row) => [...row]);
  }

  get nreg(): number {
    return this.names.length;
  }

  /** Width of one lane in bits. */
  get elemWidth(): number {
    return this.width / this.elements;
  }

  get rectWidth(): number {
    return this.width * this.config.sceneRatio;
  }

  /** Label width approximated at half a unit per character. */
  get labelWidth(): number {
    return Math.max(...this.names.map((n) => n.length)) * 0.5;
  }

  getPlacementWidth(): number {
    const label = this.labelWidth < 2 ? 2 : this.labelWidth;
    return Math.ceil(this.rectWidth + label);
  }

  getPlacementHeight(): number {
    return this.nreg;
  }

  getPlacementMarker(): number {
    return MARK_REGISTER;
  }

  setPlacementCorner(row: number, col: number): void {
    this.row = row;
    this.col = col;
    this.position = { x: this.rectRight - this.rectWidth / 2, y: row + this.nreg / 2 };
  }

  moveTo(target: Point): this {
    const dx = target.x - this.position.x;
    const dy = target.y - this.position.y;
    this.position = { ...target };
    this.col += dx;
    this.row += dy;
    return this;
  }

  /**
   * Centre of the field `width` bits wide that starts `offset` bits above lane `index` of row
   * `regIdx`.
   */
  getElemPos(index: number, regIdx = 0, offset = 0, width = this.elemWidth): Point {
    if (!Number.isInteger(regIdx) || regIdx < 0 || regIdx >= this.nreg) {
      throw new InvalidArgumentError(`Register row ${regIdx} out of range 0..${this.nreg - 1}`);
    }
    const lsb = index * this.elemWidth + offset;
    if (index < 0 || lsb < 0 || lsb + width > this.width) {
      throw new InvalidArgumentError(`Field [${lsb}, ${lsb + width}) exceeds ${this.width}-bit register`);
    }
    return {
      x: this.rectRight - (lsb + width / 2) * this.config.sceneRatio,
      y: this.row + regIdx + 0.5,
    };
  }

  getElemValue(index: number, regIdx = 0): ElementValue | undefined {
    return this.values[regIdx]?.[index];
  }

  clone(): RegisterUnit {
    const copy = new RegisterUnit(this.config, {
      names: this.names,
      width: this.width,
      elements: this.elements,
      color: this.color,
      values: this.values,
    });
    copy.setPlacementCorner(this.row, this.col);
    return copy;
  }

  toString(): string {
    return `Reg_${this.names.join(",")}_${this.width}b`;
  }

  private get rectRight(): number {
    return this.col + this.getPlacementWidth();
  }
}

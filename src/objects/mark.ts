import type { Point, VisualItem } from "../types/isa";
import { nextHandle } from "../utils/handles";

export type MarkShape = "triangle" | "rect";

export interface MarkOptions {
  shape: MarkShape;
  color: string;
  width: number;
  height: number;
  fillOpacity?: number;
  position: Point;
}

/** Address pointer or covered-range band drawn on a memory map. Not placeable. */
export class MarkUnit implements VisualItem {
  readonly handle = nextHandle();
  readonly kind = "mark" as const;
  readonly requireSerialization = false;
  position: Point;

  readonly shape: MarkShape;
  readonly color: string;
  readonly width: number;
  readonly height: number;
  readonly fillOpacity: number;

  constructor(options: MarkOptions) {
    this.shape = options.shape;
    this.color = options.color;
    this.width = options.width;
    this.height = options.height;
    this.fillOpacity = options.fillOpacity ?? 0;
    this.position = { ...options.position };
  }

  clone(): MarkUnit {
    return new MarkUnit({
      shape: this.shape,
      color: this.color,
      width: this.width,
      height: this.height,
      fillOpacity: this.fillOpacity,
      position: this.position,
    });
  }
}

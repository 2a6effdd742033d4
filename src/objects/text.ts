import type { Point, VisualItem } from "../types/isa";
import { nextHandle } from "../utils/handles";

/** Free text on stage, such as a section title. */
export class TextUnit implements VisualItem {
  readonly handle = nextHandle();
  readonly kind = "text" as const;
  readonly requireSerialization = false;
  position: Point;

  constructor(readonly text: string, readonly color: string, position: Point = { x: 0, y: 0 }) {
    this.position = { ...position };
  }

  clone(): TextUnit {
    return new TextUnit(this.text, this.color, this.position);
  }
}

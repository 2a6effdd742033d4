import type { ElementUnit } from "../objects/element";
import type { RegisterUnit } from "../objects/register";
import type { VisualItem } from "../types/isa";
import type { Animation } from "./primitives";
import { InvalidArgumentError } from "../utils/errors";
import { fadeIn, fadeOut, fadeTransform, group, moveTo, succession, transform } from "./primitives";

/** Fade in freshly declared registers (or any declared unit). */
export function declRegister(...registers: VisualItem[]): Animation {
  return fadeIn(registers);
}

/** Fade the element in over its lane of the register. */
export function readElem(register: RegisterUnit, elem: ElementUnit, index: number, regIdx: number, offset: number): Animation {
  elem.moveTo(register.getElemPos(index, regIdx, offset, elem.width));
  return fadeIn(elem);
}

/** Transform `oldElem` into `newElem` sitting on the target lane. */
export function assignElem(
  oldElem: ElementUnit,
  newElem: ElementUnit,
  register: RegisterUnit,
  index: number,
  regIdx: number,
  offset: number,
): Animation {
  newElem.moveTo(register.getElemPos(index, regIdx, offset, newElem.width));
  return transform(oldElem, newElem);
}

/** New element right-aligned on the old one, `offset` bits above its LSB. */
export function replaceElem(oldElem: ElementUnit, newElem: ElementUnit, offset: number): Animation {
  newElem.moveTo(oldElem.getElemPos(offset, newElem.width));
  return fadeTransform(oldElem, newElem);
}

export type RegisterAlign = "center" | "left" | "right";

/** Fade a new register in over the old one, aligned on its centre, left or right edge. */
export function replaceRegister(oldReg: RegisterUnit, newReg: RegisterUnit, align: RegisterAlign = "center"): Animation {
  let x: number;
  switch (align) {
    case "center":
      x = oldReg.position.x;
      break;
    case "right":
      x = oldReg.position.x + oldReg.rectWidth / 2 - newReg.rectWidth / 2;
      break;
    case "left":
      x = oldReg.position.x - oldReg.rectWidth / 2 + newReg.rectWidth / 2;
      break;
    default: {
      const exhaustiveCheck: never = align;
      throw new InvalidArgumentError(`Unknown register alignment ${String(exhaustiveCheck)}`);
    }
  }
  newReg.moveTo({ x, y: oldReg.position.y });
  return group(fadeIn(newReg), fadeOut(oldReg));
}

/** Slide the parts side by side onto the new register (first part at the right), then swap. */
export function concatVector(parts: RegisterUnit[], merged: RegisterUnit): Animation {
  const right = merged.position.x + merged.rectWidth / 2;
  let used = 0;
  const moves = parts.map((part) => {
    const target = { x: right - used - part.rectWidth / 2, y: merged.position.y };
    used += part.rectWidth;
    return moveTo(part, target);
  });
  return succession(group(...moves), group(fadeIn(merged), ...parts.map((p) => fadeOut(p))));
}

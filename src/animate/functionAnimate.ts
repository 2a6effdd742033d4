import type { ElementUnit } from "../objects/element";
import type { FunctionUnit } from "../objects/functionUnit";
import type { Animation } from "./primitives";
import { fadeIn, fadeOut, group, moveTo, offset as diff, succession, wait } from "./primitives";

export function declFunction(...units: FunctionUnit[]): Animation {
  return fadeIn(units);
}

/** Immediate operand faded in straight onto its argument port. */
export function readImm(unit: FunctionUnit, elem: ElementUnit, argIndex: number, offset = 0): Animation {
  elem.moveTo(unit.getArgPos(argIndex, offset, elem.width));
  return fadeIn(elem);
}

/**
 * Move arguments onto their ports, pause, then fade arguments into the unit and results out of
 * it. Arguments already sitting on their port (immediates) are not moved.
 */
export function functionCall(
  unit: FunctionUnit,
  args: ElementUnit[],
  results: ElementUnit[],
  argsOffset: number[] = [],
  resOffset: number[] = [],
): Animation {
  const moves: Animation[] = [];
  const fades: Animation[] = [];
  args.forEach((arg, i) => {
    const port = unit.getArgPos(i, argsOffset[i] ?? 0, arg.width);
    if (arg.position.x !== port.x || arg.position.y !== port.y) moves.push(moveTo(arg, port));
    fades.push(fadeOut(arg, diff(unit.position, port)));
  });
  results.forEach((res, i) => {
    const port = unit.getResPos(i, resOffset[i] ?? 0, res.width);
    res.moveTo(port);
    fades.push(fadeIn(res, diff(port, unit.position)));
  });
  return succession(group(...moves), wait(0.5), group(...fades));
}

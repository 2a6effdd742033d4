import type { ElementUnit } from "../objects/element";
import type { MarkUnit } from "../objects/mark";
import type { MemoryUnit } from "../objects/memoryUnit";
import type { Animation } from "./primitives";
import { create, fadeIn, fadeOut, group, indicate, moveTo, offset, succession, transform, wait } from "./primitives";

export interface MemoryAccess {
  memory: MemoryUnit;
  addr: ElementUnit;
  data: ElementUnit;
  status: ElementUnit | null;
}

export interface MemoryMarks {
  addrMark: MarkUnit;
  memMark: MarkUnit;
  /** The address element's value is the address accessed. */
  addrMatch: boolean;
}

export function declMemory(memory: MemoryUnit): Animation {
  return fadeIn(memory);
}

function statusStep(access: MemoryAccess): Animation[] {
  const { memory, status } = access;
  if (!memory.hasStatusPort || !status) return [];
  status.moveTo(memory.getStatusPos(status.width));
  return [fadeIn(status)];
}

/** Read without a known address: no marks, the data simply leaves the data port. */
export function readMemoryWithoutAddr(access: MemoryAccess): Animation {
  const { memory, addr, data } = access;
  const addrPos = memory.getAddrPos(addr.width);
  const dataPos = memory.getDataPos(data.width);
  data.moveTo(dataPos);
  return succession(
    moveTo(addr, addrPos),
    group(fadeIn(data, offset(dataPos, memory.position)), fadeOut(addr, offset(memory.position, addrPos))),
    ...statusStep(access),
  );
}

export function writeMemoryWithoutAddr(access: MemoryAccess): Animation {
  const { memory, addr, data } = access;
  const addrPos = memory.getAddrPos(addr.width);
  const dataPos = memory.getDataPos(data.width);
  return succession(
    group(moveTo(addr, addrPos), moveTo(data, dataPos)),
    group(fadeOut(data, offset(memory.position, dataPos)), fadeOut(addr, offset(memory.position, addrPos))),
    ...statusStep(access),
  );
}

/**
 * Address onto the port (serialized memory) or a flash in place (parallel memory), address into
 * its mark, memory mark created, data out of the data port.
 */
export function readMemory(access: MemoryAccess, marks: MemoryMarks): Animation {
  const { memory, addr, data } = access;
  const { addrMark, memMark, addrMatch } = marks;

  const approach = !addrMatch
    ? wait(1)
    : memory.requireSerialization
      ? moveTo(addr, memory.getAddrPos(addr.width))
      : indicate(addr, addr.color);
  const pointAt = addrMatch ? transform(addr, addrMark) : fadeIn(addrMark, offset(addrMark.position, addr.position));

  let dataStep: Animation;
  if (memory.requireSerialization) {
    const dataPos = memory.getDataPos(data.width);
    data.moveTo(dataPos);
    dataStep = group(create(memMark), fadeIn(data, offset(dataPos, memMark.position)));
  } else {
    data.moveTo(memMark.position);
    dataStep = create(memMark);
  }
  return succession(approach, pointAt, dataStep, ...statusStep(access));
}

export function writeMemory(access: MemoryAccess, marks: MemoryMarks): Animation {
  const { memory, addr, data } = access;
  const { addrMark, memMark, addrMatch } = marks;

  const dataPos = memory.getDataPos(data.width);
  const approach = !addrMatch
    ? wait(1)
    : memory.requireSerialization
      ? group(moveTo(addr, memory.getAddrPos(addr.width)), moveTo(data, dataPos))
      : indicate(addr, addr.color);
  const pointAt = addrMatch ? transform(addr, addrMark) : fadeIn(addrMark, offset(addrMark.position, addr.position));
  const dataStep = memory.requireSerialization
    ? group(create(memMark), fadeOut(data, offset(memMark.position, dataPos)))
    : transform(data, memMark);
  return succession(approach, pointAt, dataStep, ...statusStep(access));
}

let counter = 0;

/** Monotonic identity for visual items; never reused within a process. */
export function nextHandle(): number {
  counter += 1;
  return counter;
}

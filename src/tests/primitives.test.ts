import { describe, test, expect } from "vitest";
import {
  camera,
  describeAnimation,
  fadeIn,
  fadeOut,
  group,
  indicate,
  itemsOf,
  moveTo,
  offset,
  succession,
  transform,
  wait,
} from "../animate/primitives";
import { TextUnit } from "../objects/text";

const item = () => new TextUnit("t", "#FFFFFF");

describe("animation primitives", () => {
  test("fades only carry a shift when given one", () => {
    const a = item();
    expect(fadeIn(a)).toEqual({ kind: "fadeIn", items: [a] });
    expect(fadeOut([a], { x: 1, y: 0 })).toEqual({ kind: "fadeOut", items: [a], shift: { x: 1, y: 0 } });
    expect("color" in indicate(a)).toBe(false);
  });

  test("moveTo copies its target", () => {
    const target = { x: 2, y: 3 };
    const anim = moveTo(item(), target);
    target.x = 9;
    expect(anim.kind === "moveTo" && anim.target).toEqual({ x: 2, y: 3 });
  });

  test("offset is the difference of two points", () => {
    expect(offset({ x: 5, y: 1 }, { x: 2, y: 3 })).toEqual({ x: 3, y: -2 });
  });

  test("describeAnimation names items by handle", () => {
    const [a, b] = [item(), item()];
    const anim = succession(
      group(moveTo(a, { x: 0, y: 0 }), wait(0.5)),
      transform(a, b),
      camera({ scale: 10 / 7, origin: { x: 0, y: 0 } }),
    );
    expect(describeAnimation(anim)).toBe(
      `succession(group(moveTo(#${a.handle}), wait(0.5)), transform(#${a.handle}->#${b.handle}), camera(1.429))`,
    );
    expect(describeAnimation(fadeIn([a, b]))).toBe(`fadeIn(#${a.handle},#${b.handle})`);
  });

  test("itemsOf walks nested animations once per item", () => {
    const [a, b, c] = [item(), item(), item()];
    const anim = group(fadeIn([a, b]), succession(transform(b, c), wait()), indicate(a));
    expect(itemsOf(anim)).toEqual([a, b, c]);
    expect(itemsOf(wait(2))).toEqual([]);
  });
});

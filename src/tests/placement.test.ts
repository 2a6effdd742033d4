import { describe, test, expect, afterEach } from "vitest";
import { PlacementEngine } from "../core/placement";
import type { PlacementOptions } from "../core/placement";
import { TextUnit } from "../objects/text";
import type { Placeable, Point, VisualItem } from "../types/isa";
import { InvalidArgumentError, UnknownItemError } from "../utils/errors";
import { nextHandle } from "../utils/handles";
import { setLogLevel, setLogSink } from "../utils/logger";
import type { LogEvent } from "../utils/logger";

class Box implements VisualItem, Placeable {
  readonly handle = nextHandle();
  readonly kind = "register" as const;
  readonly requireSerialization = false;
  position: Point = { x: 0, y: 0 };
  corner: [number, number] | null = null;

  constructor(readonly w: number, readonly h: number, readonly marker = 2) {}

  clone(): Box {
    return new Box(this.w, this.h, this.marker);
  }
  getPlacementWidth(): number {
    return this.w;
  }
  getPlacementHeight(): number {
    return this.h;
  }
  getPlacementMarker(): number {
    return this.marker;
  }
  setPlacementCorner(row: number, col: number): void {
    this.corner = [row, col];
  }
}

const RB: PlacementOptions = { frameWidth: 16, frameHeight: 9, placementStrategy: "RB" };
const BR: PlacementOptions = { frameWidth: 16, frameHeight: 9, placementStrategy: "BR" };

afterEach(() => {
  setLogLevel("WARN");
});

describe("PlacementEngine.place", () => {
  test("RB fills a row before moving down", () => {
    const map = new PlacementEngine(RB);
    const a = new Box(2, 1);
    const b = new Box(2, 1);
    expect(map.place(a)).toEqual([1, 1]);
    expect(map.place(b)).toEqual([1, 4]);
    expect(b.corner).toEqual([1, 4]);
  });

  test("BR fills a column before moving right", () => {
    const map = new PlacementEngine(BR);
    map.place(new Box(2, 1));
    expect(map.place(new Box(2, 1))).toEqual([3, 1]);
  });

  test("a different marker does not share the row band", () => {
    const map = new PlacementEngine(RB);
    map.place(new Box(2, 1, 2));
    expect(map.place(new Box(2, 1, 3))).toEqual([3, 1]);
  });

  test("alignWith restricts the search to the row of the aligned item", () => {
    const map = new PlacementEngine(BR);
    const first = new Box(2, 1);
    map.place(first, "first");
    expect(map.place(new Box(2, 1), "second", "first")).toEqual([1, 4]);
    expect(map.place(new Box(2, 1), "third", first)).toEqual([1, 7]);
  });

  test("aligning with an incompatible row falls back to a normal search", () => {
    const map = new PlacementEngine(RB);
    map.place(new Box(2, 1, 2), "reg");
    expect(map.place(new Box(2, 1, 3), "fn", "reg")).toEqual([3, 1]);
  });

  test("an unknown align key places normally", () => {
    const map = new PlacementEngine(BR);
    map.place(new Box(2, 1));
    expect(map.place(new Box(2, 1), undefined, "missing")).toEqual([3, 1]);
  });

  test("grows the grid until a wide item fits", () => {
    const map = new PlacementEngine(RB);
    expect(map.place(new Box(18, 1))).toEqual([1, 1]);
    expect(map.size()).toEqual({ width: 21, height: 12 });
    expect(map.place(new Box(18, 1))).toEqual([3, 1]);
  });

  test("growth is monotonic and terminates", () => {
    const events: LogEvent[] = [];
    const restore = setLogSink((e) => events.push(e));
    setLogLevel("DEBUG");
    try {
      const map = new PlacementEngine(RB);
      for (let i = 0; i < 6; i++) map.place(new Box(7, 3));
      const grows = events.filter((e) => e.name === "placement.grow");
      expect(grows.length).toBeGreaterThan(0);
      for (let i = 1; i < grows.length; i++) {
        expect(Number(grows[i].payload.width)).toBeGreaterThanOrEqual(Number(grows[i - 1].payload.width));
        expect(Number(grows[i].payload.height)).toBeGreaterThanOrEqual(Number(grows[i - 1].payload.height));
      }
      expect(map.placedItems()).toHaveLength(6);
    } finally {
      restore();
    }
  });

  test.each([RB, BR])("placed rectangles never overlap margins (%o)", (options) => {
    const map = new PlacementEngine(options);
    const boxes = [
      new Box(3, 1, 2),
      new Box(5, 5, 3),
      new Box(2, 2, 2),
      new Box(8, 4, 4),
      new Box(1, 1, 2),
      new Box(4, 5, 3),
      new Box(6, 1, 2),
      new Box(2, 3, 4),
    ];
    boxes.forEach((b) => map.place(b));

    for (const a of boxes) {
      const [ar, ac] = a.corner ?? [-1, -1];
      for (let r = ar; r < ar + a.h; r++) {
        for (let c = ac; c < ac + a.w; c++) expect(map.cell(r, c)).toBe(a.marker);
      }
      for (const b of boxes) {
        if (a === b) continue;
        const [br, bc] = b.corner ?? [-1, -1];
        const rowsApart = br > ar + a.h || br + b.h - 1 < ar - 1;
        const colsApart = bc > ac + a.w || bc + b.w - 1 < ac - 1;
        expect(rowsApart || colsApart).toBe(true);
      }
    }
  });
});

describe("PlacementEngine.placeGroup", () => {
  test("forced ratio lays the group out right to left, row by row", () => {
    const map = new PlacementEngine(RB);
    const boxes = [new Box(2, 1), new Box(2, 1), new Box(2, 1), new Box(2, 1)];
    expect(map.placeGroup(boxes, ["a", "b", "c", "d"], [2, 2])).toEqual([
      [1, 4],
      [1, 1],
      [3, 4],
      [3, 1],
    ]);
    expect(map.positionOf("c")).toEqual([3, 4]);
  });

  test("items already placed keep their corner and stay out of the block", () => {
    const map = new PlacementEngine(RB);
    const [a, b] = [new Box(2, 1), new Box(2, 1)];
    map.place(a, "a");
    expect(map.placeGroup([a, b], ["a", "b"])).toEqual([
      [1, 1],
      [3, 1],
    ]);
    expect(a.corner).toEqual([1, 1]);
    expect(map.placedItems()).toHaveLength(2);
    expect(map.placeGroup([a, b], ["a", "b"])).toEqual([
      [1, 1],
      [3, 1],
    ]);
    expect(map.dump().split("\n").slice(0, 5)).toEqual([
      "****            ",
      "*OO*            ",
      "****            ",
      "*OO*            ",
      "****            ",
    ]);
  });

  test("automatic split approximates the frame ratio", () => {
    const map = new PlacementEngine(RB);
    const boxes = [new Box(2, 1), new Box(2, 1), new Box(2, 1), new Box(2, 1)];
    expect(map.placeGroup(boxes)).toEqual([
      [1, 10],
      [1, 7],
      [1, 4],
      [1, 1],
    ]);
    expect(map.keyOf(boxes[2])).toBe(boxes[2].handle);
  });

  test("rejects an empty group and mismatched keys", () => {
    const map = new PlacementEngine(RB);
    expect(() => map.placeGroup([])).toThrow(InvalidArgumentError);
    expect(() => map.placeGroup([new Box(1, 1)], ["a", "b"])).toThrow(InvalidArgumentError);
  });
});

describe("PlacementEngine queries", () => {
  test("dump, occupied box and camera scale", () => {
    const map = new PlacementEngine(RB);
    map.place(new Box(2, 1));
    const lines = map.dump().split("\n");
    expect(lines).toHaveLength(9);
    expect(lines[0]).toBe("****" + " ".repeat(12));
    expect(lines[1]).toBe("*OO*" + " ".repeat(12));
    expect(lines[3]).toBe(" ".repeat(16));
    expect(map.occupiedWidth()).toBe(4);
    expect(map.occupiedHeight()).toBe(3);
    expect(map.origin()).toEqual({ x: 2, y: 1.5 });
    expect(map.scaleFor(16, 7)).toBeCloseTo(4 / 7, 10);
  });

  test("get, has and unknown keys", () => {
    const map = new PlacementEngine(RB);
    const box = new Box(2, 1);
    map.place(box, "r0");
    expect(map.has("r0")).toBe(true);
    expect(map.get("r0")).toBe(box);
    expect(map.keyOf(box)).toBe("r0");
    expect(() => map.get("nope")).toThrow(UnknownItemError);
    expect(() => map.cell(99, 0)).toThrow(InvalidArgumentError);
  });

  test("placing the same item under its key again is a no-op", () => {
    const map = new PlacementEngine(RB);
    const box = new Box(2, 1);
    expect(map.place(box, "r0")).toEqual([1, 1]);
    expect(map.place(box, "r0")).toEqual([1, 1]);
    expect(map.placedItems()).toHaveLength(1);
  });
});

describe("PlacementEngine argument checks", () => {
  test("rejects items without placement geometry", () => {
    const map = new PlacementEngine(RB);
    expect(() => map.place(new TextUnit("title", "#FFFFFF"))).toThrow(InvalidArgumentError);
  });

  test("rejects non-positive sizes and margin markers", () => {
    const map = new PlacementEngine(RB);
    expect(() => map.place(new Box(0, 1))).toThrow(InvalidArgumentError);
    expect(() => map.place(new Box(2, -1))).toThrow(InvalidArgumentError);
    expect(() => map.place(new Box(2, 1, 1))).toThrow(InvalidArgumentError);
  });

  test("rejects a key already used by another item", () => {
    const map = new PlacementEngine(RB);
    map.place(new Box(2, 1), "k");
    expect(() => map.place(new Box(2, 1), "k")).toThrow(/already used/);
  });
});

describe("PlacementEngine.reset and resize", () => {
  test("keeps selected items at their corners", () => {
    const map = new PlacementEngine(RB);
    const a = new Box(2, 1);
    const b = new Box(2, 1);
    map.place(a, "a");
    map.place(b, "b");
    map.reset([b]);
    expect(map.has("a")).toBe(false);
    expect(map.positionOf("b")).toEqual([1, 4]);
    expect(map.cell(1, 1)).toBe(0);
    expect(map.cell(1, 4)).toBe(2);
  });

  test("re-searches kept items when positions are not kept", () => {
    const map = new PlacementEngine(RB);
    map.place(new Box(2, 1), "a");
    const b = new Box(2, 1);
    map.place(b, "b");
    map.reset([b], false);
    expect(map.positionOf("b")).toEqual([1, 1]);
    expect(b.corner).toEqual([1, 1]);
  });

  test("reset returns the grid to the frame size", () => {
    const map = new PlacementEngine(RB);
    map.place(new Box(18, 1));
    map.reset();
    expect(map.size()).toEqual({ width: 16, height: 9 });
    expect(map.placedItems()).toEqual([]);
  });

  test("resize keeps occupancy in the overlapping region", () => {
    const map = new PlacementEngine(RB);
    map.place(new Box(2, 1));
    map.resize(20, 10);
    expect(map.cell(1, 2)).toBe(2);
    expect(map.cell(9, 19)).toBe(0);
    map.resize(4, 3);
    expect(map.size()).toEqual({ width: 4, height: 3 });
    expect(map.cell(1, 1)).toBe(2);
    expect(map.cell(1, 2)).toBe(2);
    expect(map.cell(1, 3)).toBe(1);
    expect(() => map.resize(0, 3)).toThrow(InvalidArgumentError);
  });

  test("a shrink that would cut a placed item is rejected", () => {
    const map = new PlacementEngine(RB);
    map.place(new Box(2, 1), "a");
    expect(() => map.resize(3, 3)).toThrow(/would cut item a/);
    expect(() => map.resize(4, 2)).toThrow(InvalidArgumentError);
    expect(map.size()).toEqual({ width: 16, height: 9 });
    expect(map.positionOf("a")).toEqual([1, 1]);
  });
});

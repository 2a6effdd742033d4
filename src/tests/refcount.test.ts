import { describe, test, expect } from "vitest";
import { fadeIn, transform } from "../animate/primitives";
import { createSceneConfig } from "../config/runtime";
import { AnimationFlow } from "../core/animationFlow";
import type { AnimationItem } from "../core/animationFlow";
import { RefCountTracker } from "../core/refcount";
import { ElementUnit } from "../objects/element";
import { TextUnit } from "../objects/text";

const config = createSceneConfig();

function element(width = 32): ElementUnit {
  return new ElementUnit(config, { width, color: "#FC6255", value: 7 });
}

describe("RefCountTracker.getDuplicate", () => {
  test("first consumer gets the item, later consumers get threaded clones", () => {
    const flow = new AnimationFlow();
    const tracker = new RefCountTracker();
    const elem = element();
    elem.moveTo({ x: 3, y: 1.5 });
    tracker.setProducer(elem);

    const consumers: AnimationItem[] = [];
    const handed: ElementUnit[] = [];
    for (let k = 0; k < 3; k++) {
      const source = tracker.getDuplicate(elem);
      const out = element();
      const consumer = flow.addAnimation({ animation: transform(source, out), src: source, dst: out });
      tracker.setConsumer(elem, consumer);
      consumers.push(consumer);
      handed.push(source);
    }

    expect(tracker.referenceCount(elem)).toBe(3);
    expect(handed[0]).toBe(elem);
    expect(handed[1]).not.toBe(elem);
    expect(handed[2]).not.toBe(elem);
    expect(handed[1].handle).not.toBe(handed[2].handle);
    expect(handed[1].position).toEqual({ x: 3, y: 1.5 });

    // clone k materializes before consumer k-1 plays and is produced by it
    expect(consumers[0].addBefore).toEqual([handed[1]]);
    expect(consumers[0].dst).toContain(handed[1]);
    expect(consumers[1].addBefore).toEqual([handed[2]]);
    expect(consumers[1].predecessors).toHaveLength(1);
    expect(consumers[1].predecessors[0]).toBe(consumers[0]);
    expect(consumers[2].predecessors[0]).toBe(consumers[1]);

    const records = tracker.duplicatesOf(elem);
    expect(records).toHaveLength(2);
    expect(records[0].clone).toBe(handed[1]);
    expect(records[0].materializeBefore).toBe(consumers[0]);
    expect(records[0].consumer).toBe(consumers[1]);
    expect(records[1].materializeBefore).toBe(consumers[1]);
    expect(records[1].consumer).toBe(consumers[2]);
  });

  test("consumers play one per step, each clone added before the previous one", () => {
    const flow = new AnimationFlow();
    const tracker = new RefCountTracker();
    const elem = element();
    tracker.setProducer(elem);
    const clones: ElementUnit[] = [];
    for (let k = 0; k < 3; k++) {
      const source = tracker.getDuplicate(elem);
      if (k > 0) clones.push(source);
      const out = element();
      const consumer = flow.addAnimation({ animation: transform(source, out), src: source, dst: out });
      tracker.setConsumer(elem, consumer);
    }
    flow.switchSection({ fadeOut: false });
    const steps = flow.analyse();
    expect(steps.map((s) => s.items.map((i) => i.id))).toEqual([[1], [2], [3]]);
    expect(steps[0].addBefore).toEqual([clones[0]]);
    expect(steps[1].addBefore).toEqual([clones[1]]);
    expect(steps[2].addBefore).toEqual([]);
  });

  test("a clone without an earlier consumer is not threaded", () => {
    const tracker = new RefCountTracker();
    const elem = element();
    tracker.getDuplicate(elem);
    const copy = tracker.getDuplicate(elem);
    expect(copy).not.toBe(elem);
    expect(tracker.duplicatesOf(elem)[0].materializeBefore).toBeNull();
  });

  test("setProducer restarts the count", () => {
    const tracker = new RefCountTracker();
    const elem = element();
    tracker.getDuplicate(elem);
    tracker.getDuplicate(elem);
    tracker.setProducer(elem);
    expect(tracker.referenceCount(elem)).toBe(0);
    expect(tracker.duplicatesOf(elem)).toEqual([]);
    expect(tracker.getDuplicate(elem)).toBe(elem);
  });
});

describe("RefCountTracker bookkeeping", () => {
  test("lastDeps returns distinct backgrounds in order", () => {
    const tracker = new RefCountTracker();
    const regA = new TextUnit("a", "#FFFFFF");
    const regB = new TextUnit("b", "#FFFFFF");
    const [e, f, g] = [element(), element(), element()];
    tracker.setProducer(e, regA);
    tracker.setProducer(f, regA);
    tracker.setProducer(g, regB);
    expect(tracker.lastDeps(e, f, g)).toEqual([regA, regB]);

    const flow = new AnimationFlow();
    const consumer = flow.addAnimation({ animation: fadeIn(g), dst: g });
    tracker.setConsumer(e, consumer, regB);
    expect(tracker.lastDeps(e)).toEqual([regB]);
    expect(tracker.entryOf(e)?.lastConsumer).toBe(consumer);
  });

  test("source registry matches on every lane field", () => {
    const tracker = new RefCountTracker();
    const reg = new TextUnit("v0", "#FFFFFF");
    const elem = element();
    tracker.setSource(elem, { register: reg, regIdx: 0, index: 1, offset: 0, width: 32 });
    expect(tracker.findBySource({ register: reg, regIdx: 0, index: 1, offset: 0, width: 32 })).toBe(elem);
    expect(tracker.findBySource({ register: reg, regIdx: 0, index: 1, offset: 0, width: 16 })).toBeUndefined();
    expect(tracker.findBySource({ register: reg, regIdx: 0, index: 2, offset: 0, width: 32 })).toBeUndefined();
    tracker.clearSources();
    expect(tracker.findBySource({ register: reg, regIdx: 0, index: 1, offset: 0, width: 32 })).toBeUndefined();
  });

  test("a newer element on a lane replaces the older one", () => {
    const tracker = new RefCountTracker();
    const reg = new TextUnit("v0", "#FFFFFF");
    const [older, newer] = [element(), element()];
    const lane = { register: reg, regIdx: 0, index: 2, offset: 0, width: 32 };
    tracker.setSource(older, lane);
    tracker.setSource(newer, lane);
    expect(tracker.findBySource(lane)).toBe(newer);
  });

  test("a write forgets every overlapping read on the lane", () => {
    const tracker = new RefCountTracker();
    const reg = new TextUnit("v0", "#FFFFFF");
    const [low, high, other] = [element(16), element(16), element()];
    tracker.setSource(low, { register: reg, regIdx: 0, index: 1, offset: 0, width: 16 });
    tracker.setSource(high, { register: reg, regIdx: 0, index: 1, offset: 16, width: 16 });
    tracker.setSource(other, { register: reg, regIdx: 0, index: 2, offset: 0, width: 32 });

    tracker.invalidateLane({ register: reg, regIdx: 0, index: 1, offset: 8, width: 8 });
    expect(tracker.findBySource({ register: reg, regIdx: 0, index: 1, offset: 0, width: 16 })).toBeUndefined();
    expect(tracker.findBySource({ register: reg, regIdx: 0, index: 1, offset: 16, width: 16 })).toBe(high);
    expect(tracker.findBySource({ register: reg, regIdx: 0, index: 2, offset: 0, width: 32 })).toBe(other);
  });

  test("reset forgets counts", () => {
    const tracker = new RefCountTracker();
    const elem = element();
    tracker.getDuplicate(elem);
    tracker.reset();
    expect(tracker.referenceCount(elem)).toBe(0);
    expect(tracker.entryOf(elem)).toBeUndefined();
  });
});

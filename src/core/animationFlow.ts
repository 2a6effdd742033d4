/**
 * core/animationFlow.ts
 * Dependency graph over declared animations and its layering into steps.
 *
 * Edges are derived when an animation is registered: A precedes B when some destination of A is a
 * source of B. Dependencies flagged `requireSerialization` add one more edge, so two animations
 * sharing such a background play in declaration order.
 */
import type { Animation } from "../animate/primitives";
import { fadeOut } from "../animate/primitives";
import type { CameraFrame, VisualItem } from "../types/isa";
import { containsItem, isDecorated, toItemList } from "../types/isa";
import { InvalidArgumentError, PredecessorDeadlockError } from "../utils/errors";
import { logError, logEvent } from "../utils/logger";

export type AnimationState = "unscheduled" | "ready" | "scheduled";

type ItemArg = VisualItem | readonly (VisualItem | null | undefined)[] | null | undefined;

export interface AnimationItemInit {
  animation: Animation;
  src?: ItemArg;
  dst?: ItemArg;
  dep?: ItemArg;
  addBefore?: ItemArg;
  addAfter?: ItemArg;
  removeBefore?: ItemArg;
  removeAfter?: ItemArg;
}

export class AnimationItem {
  readonly animation: Animation;
  readonly src: VisualItem[];
  readonly dst: VisualItem[];
  readonly dep: VisualItem[];
  readonly addBefore: VisualItem[];
  readonly addAfter: VisualItem[];
  readonly removeBefore: VisualItem[];
  readonly removeAfter: VisualItem[];

  readonly predecessors: AnimationItem[] = [];
  readonly successors: AnimationItem[] = [];
  state: AnimationState = "unscheduled";

  constructor(readonly id: number, init: AnimationItemInit) {
    this.animation = init.animation;
    this.src = toItemList(init.src);
    this.dst = toItemList(init.dst);
    this.dep = toItemList(init.dep);
    this.addBefore = toItemList(init.addBefore);
    this.addAfter = toItemList(init.addAfter);
    this.removeBefore = toItemList(init.removeBefore);
    this.removeAfter = toItemList(init.removeAfter);

    if (this.src.length === 0 && this.dst.length === 0) {
      throw new InvalidArgumentError("An animation needs at least one source or destination item");
    }
  }

  /** Some destination of this item is a source of `post`. */
  isPredecessorOf(post: AnimationItem): boolean {
    return this.dst.some((item) => containsItem(post.src, item));
  }

  isSuccessorOf(pre: AnimationItem): boolean {
    return this.src.some((item) => containsItem(pre.dst, item));
  }

  hasBackground(item: VisualItem): boolean {
    return containsItem(this.dep, item);
  }

  /** Append a destination after registration (used to thread duplicated elements). */
  addDestination(item: VisualItem): void {
    if (!containsItem(this.dst, item)) this.dst.push(item);
  }

  addBeforePlay(item: VisualItem): void {
    if (!containsItem(this.addBefore, item)) this.addBefore.push(item);
  }
}

export interface SectionOptions {
  wait?: number;
  fadeOut?: boolean;
  camera?: CameraFrame | null;
  /** `null` keeps nothing on a fade-out. */
  keepItems?: readonly VisualItem[] | null;
  title?: string;
}

export interface Section {
  index: number;
  title?: string;
  items: AnimationItem[];
  wait: number;
  fadeOut: boolean;
  camera: CameraFrame | null;
  keepItems: VisualItem[] | null;
}

export interface Step {
  section: number;
  /** Items whose animations play concurrently; empty for a fade-out step. */
  items: AnimationItem[];
  animations: Animation[];
  wait: number;
  camera: CameraFrame | null;
  addBefore: VisualItem[];
  addAfter: VisualItem[];
  removeBefore: VisualItem[];
  removeAfter: VisualItem[];
  fadeOut: boolean;
}

export class AnimationFlow {
  private readonly sectionList: Section[] = [];
  private pending: AnimationItem[] = [];
  private stepList: Step[] = [];
  private liveItems: VisualItem[] = [];
  private idCounter = 0;

  // ---- construction ----

  /** Register one animation and derive its edges against the pending section. */
  addAnimation(init: AnimationItemInit): AnimationItem {
    const item = new AnimationItem(++this.idCounter, init);

    for (const existing of this.pending) {
      if (item.isSuccessorOf(existing)) link(existing, item);
      if (item.isPredecessorOf(existing)) link(item, existing);

      for (const dep of item.dep) {
        if (dep.requireSerialization && existing.hasBackground(dep)) link(existing, item);
      }
    }

    this.pending.push(item);
    return item;
  }

  /**
   * Close the pending animations into a section. Two boundaries in a row merge into the earlier
   * section: waits add up, fade-out flags OR together and only items kept by both stay kept.
   */
  switchSection(options: SectionOptions = {}): void {
    const wait = options.wait ?? 0;
    const fadeOut = options.fadeOut ?? true;
    const camera = options.camera ?? null;
    const keepItems = options.keepItems ? [...options.keepItems] : null;

    if (this.pending.length > 0) {
      this.sectionList.push({
        index: this.sectionList.length,
        title: options.title,
        items: this.pending,
        wait,
        fadeOut,
        camera,
        keepItems,
      });
    } else {
      const last = this.sectionList.at(-1);
      if (last) {
        last.wait += wait;
        last.fadeOut = last.fadeOut || fadeOut;
        last.keepItems =
          last.keepItems && keepItems ? last.keepItems.filter((k) => containsItem(keepItems, k)) : null;
        last.camera = mergeCamera(last.camera, camera);
      }
    }
    this.pending = [];
  }

  // ---- analysis ----

  /**
   * Layer every closed section into steps. Re-running gives the same result. A cycle raises
   * `PredecessorDeadlockError`; steps of the sections before it stay available through `steps`.
   */
  analyse(): Step[] {
    this.stepList = [];
    this.liveItems = [];
    let live: VisualItem[] = [];

    for (const section of this.sectionList) {
      const { steps, live: nextLive } = this.layerSection(section, live);
      this.stepList.push(...steps);
      live = nextLive;
    }

    this.liveItems = live;
    logEvent("scene.flow.analysed", { sections: this.sectionList.length, steps: this.stepList.length });
    return [...this.stepList];
  }

  get steps(): readonly Step[] {
    return this.stepList;
  }

  get sections(): readonly Section[] {
    return this.sectionList;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** Items left on stage after the last analysed section. */
  carryOver(): VisualItem[] {
    return [...this.liveItems];
  }

  private layerSection(section: Section, liveIn: VisualItem[]): { steps: Step[]; live: VisualItem[] } {
    const steps: Step[] = [];
    const live = [...liveIn];
    const addLive = (item: VisualItem) => {
      if (!containsItem(live, item)) live.push(item);
    };
    const dropLive = (item: VisualItem) => {
      const at = live.findIndex((x) => x.handle === item.handle);
      if (at >= 0) live.splice(at, 1);
    };

    const remaining = new Map<number, Set<number>>();
    for (const item of section.items) {
      item.state = "unscheduled";
      remaining.set(item.id, new Set(item.predecessors.map((p) => p.id)));
    }

    let unscheduled = [...section.items];
    while (unscheduled.length > 0) {
      const ready = unscheduled.filter((item) => (remaining.get(item.id)?.size ?? 0) === 0);
      if (ready.length === 0) {
        const blocked = unscheduled.map((i) => i.id);
        logError("flow.deadlock", { section: section.index, blocked });
        throw new PredecessorDeadlockError(section.index, blocked);
      }
      for (const item of ready) item.state = "ready";

      unscheduled = unscheduled.filter((item) => item.state === "unscheduled");
      for (const left of unscheduled) {
        const preds = remaining.get(left.id);
        for (const item of ready) preds?.delete(item.id);
      }

      // Stage bookkeeping, in play order.
      for (const item of ready) item.addBefore.forEach(addLive);
      for (const item of ready) item.removeBefore.forEach(dropLive);
      for (const item of ready) {
        for (const src of item.src) {
          if (item.hasBackground(src)) continue;
          if (stillNeeded(src, ready, unscheduled)) continue;
          dropLive(src);
        }
      }
      for (const item of ready) item.dst.forEach(addLive);
      for (const item of ready) item.addAfter.forEach(addLive);
      for (const item of ready) item.removeAfter.forEach(dropLive);

      steps.push({
        section: section.index,
        items: ready,
        animations: ready.map((i) => i.animation),
        wait: 0,
        camera: steps.length === 0 ? section.camera : null,
        addBefore: ready.flatMap((i) => i.addBefore),
        addAfter: ready.flatMap((i) => i.addAfter),
        removeBefore: ready.flatMap((i) => i.removeBefore),
        removeAfter: ready.flatMap((i) => i.removeAfter),
        fadeOut: false,
      });
      for (const item of ready) item.state = "scheduled";
    }

    const lastStep = steps.at(-1);
    if (lastStep) lastStep.wait = section.wait;

    if (!section.fadeOut) return { steps, live };

    const keep = expandKeep(section.keepItems);
    const leaving = live.filter((item) => !containsItem(keep, item));
    const staying = live.filter((item) => containsItem(keep, item));
    if (leaving.length > 0) {
      steps.push({
        section: section.index,
        items: [],
        animations: [fadeOut(leaving)],
        wait: 0,
        camera: null,
        addBefore: [],
        addAfter: [],
        removeBefore: [],
        removeAfter: leaving,
        fadeOut: true,
      });
    }
    return { steps, live: staying };
  }
}

// ─── Helpers ───

function link(pre: AnimationItem, post: AnimationItem): void {
  if (!post.predecessors.includes(pre)) post.predecessors.push(pre);
  if (!pre.successors.includes(post)) pre.successors.push(post);
}

/**
 * A consumed source stays on stage while another animation of the same step keeps it as
 * background, or a later animation still reads it.
 */
function stillNeeded(item: VisualItem, step: AnimationItem[], later: AnimationItem[]): boolean {
  if (step.some((other) => other.hasBackground(item))) return true;
  return later.some((other) => containsItem(other.src, item) || containsItem(other.dep, item));
}

/** Kept items plus whatever they carry (memory marks). */
function expandKeep(keepItems: VisualItem[] | null): VisualItem[] {
  if (!keepItems) return [];
  const out: VisualItem[] = [];
  for (const item of keepItems) {
    if (!containsItem(out, item)) out.push(item);
    if (isDecorated(item)) {
      for (const attached of item.attachedItems()) {
        if (!containsItem(out, attached)) out.push(attached);
      }
    }
  }
  return out;
}

function mergeCamera(prev: CameraFrame | null, next: CameraFrame | null): CameraFrame | null {
  if (!prev) return next;
  if (!next) return prev;
  return { scale: prev.scale * next.scale, origin: { ...next.origin } };
}

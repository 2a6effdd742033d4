/**
 * core/refcount.ts
 * Consumption counting for mutable elements. The first consumer gets the element itself; every
 * later consumer gets a clone that appears on stage just before the previous consumer plays, so
 * the old copy stays visible where the earlier animation left it.
 */
import type { VisualItem } from "../types/isa";
import type { AnimationItem } from "./animationFlow";

export interface RefCountEntry {
  referenceCount: number;
  lastConsumer: AnimationItem | null;
  /** Background item (register, function or memory unit) active when the item was last touched. */
  lastDep: VisualItem | null;
}

export interface DuplicateRecord {
  original: VisualItem;
  clone: VisualItem;
  /** Animation whose `addBefore` list materializes the clone; null when nothing consumed it yet. */
  materializeBefore: AnimationItem | null;
  /** Animation that consumes the clone, filled by `setConsumer`. */
  consumer: AnimationItem | null;
}

export interface ElementSource {
  register: VisualItem;
  regIdx: number;
  index: number;
  offset: number;
  width: number;
}

type Cloneable<T> = { clone(): T } & VisualItem;

export class RefCountTracker {
  private readonly entries = new Map<number, RefCountEntry>();
  private readonly duplicates = new Map<number, DuplicateRecord[]>();
  private readonly sources = new Map<number, { elem: VisualItem; source: ElementSource }>();

  /** Register a freshly produced item with a zero count. */
  setProducer(item: VisualItem, dep: VisualItem | null = null): void {
    this.entries.set(item.handle, { referenceCount: 0, lastConsumer: null, lastDep: dep });
    this.duplicates.delete(item.handle);
  }

  /**
   * The item itself on first consumption, otherwise a clone threaded behind the last consumer.
   * Always counts one consumption.
   */
  getDuplicate<T extends Cloneable<T>>(item: T): T {
    const entry = this.ensure(item);
    entry.referenceCount += 1;
    if (entry.referenceCount === 1) return item;

    const copy = item.clone();
    const before = entry.lastConsumer;
    if (before) {
      before.addBeforePlay(copy);
      // the clone is produced by that step, which orders the next consumer after it
      before.addDestination(copy);
    }
    const records = this.duplicates.get(item.handle) ?? [];
    records.push({ original: item, clone: copy, materializeBefore: before, consumer: null });
    this.duplicates.set(item.handle, records);
    return copy;
  }

  /** Record the animation that consumed `item` (or its latest clone). */
  setConsumer(item: VisualItem, consumer: AnimationItem, dep: VisualItem | null = null): void {
    const entry = this.ensure(item);
    entry.lastConsumer = consumer;
    if (dep) entry.lastDep = dep;

    const pending = this.duplicates.get(item.handle)?.at(-1);
    if (pending && pending.consumer === null && containsClone(consumer, pending.clone)) {
      pending.consumer = consumer;
    }
  }

  referenceCount(item: VisualItem): number {
    return this.entries.get(item.handle)?.referenceCount ?? 0;
  }

  entryOf(item: VisualItem): Readonly<RefCountEntry> | undefined {
    return this.entries.get(item.handle);
  }

  duplicatesOf(item: VisualItem): DuplicateRecord[] {
    return [...(this.duplicates.get(item.handle) ?? [])];
  }

  /** Distinct background items the given elements were last attached to. */
  lastDeps(...items: VisualItem[]): VisualItem[] {
    const deps: VisualItem[] = [];
    for (const item of items) {
      const dep = this.entries.get(item.handle)?.lastDep;
      if (dep && !deps.some((d) => d.handle === dep.handle)) deps.push(dep);
    }
    return deps;
  }

  // ---- element-source registry ----

  /** Register `elem` as the element read from `source`; an earlier element on the same lane is forgotten. */
  setSource(elem: VisualItem, source: ElementSource): void {
    for (const [handle, entry] of this.sources) {
      if (sameLane(entry.source, source) && sameBits(entry.source, source)) this.sources.delete(handle);
    }
    this.sources.set(elem.handle, { elem, source: { ...source } });
  }

  /** Forget every element whose bits overlap `written`; later reads must see the write. */
  invalidateLane(written: ElementSource): void {
    const end = written.offset + written.width;
    for (const [handle, entry] of this.sources) {
      const { offset, width } = entry.source;
      if (sameLane(entry.source, written) && offset < end && written.offset < offset + width) {
        this.sources.delete(handle);
      }
    }
  }

  /** Element already read from exactly this register lane with the same width, if any. */
  findBySource(query: ElementSource): VisualItem | undefined {
    for (const { elem, source } of this.sources.values()) {
      if (sameLane(source, query) && sameBits(source, query)) return elem;
    }
    return undefined;
  }

  /** Forget the lane registry; done at every section end. */
  clearSources(): void {
    this.sources.clear();
  }

  reset(): void {
    this.entries.clear();
    this.duplicates.clear();
    this.sources.clear();
  }

  private ensure(item: VisualItem): RefCountEntry {
    let entry = this.entries.get(item.handle);
    if (!entry) {
      entry = { referenceCount: 0, lastConsumer: null, lastDep: null };
      this.entries.set(item.handle, entry);
    }
    return entry;
  }
}

function containsClone(consumer: AnimationItem, clone: VisualItem): boolean {
  return consumer.src.some((s) => s.handle === clone.handle);
}

function sameLane(a: ElementSource, b: ElementSource): boolean {
  return a.register.handle === b.register.handle && a.regIdx === b.regIdx && a.index === b.index;
}

function sameBits(a: ElementSource, b: ElementSource): boolean {
  return a.offset === b.offset && a.width === b.width;
}

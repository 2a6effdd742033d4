// Shared shapes of the diagram model. Items are compared by their `handle`, never by value.

export type ItemKind = "register" | "element" | "function" | "memory" | "mark" | "text";

/** Scene coordinates: x grows to the right, y grows downwards (one unit per placement cell). */
export interface Point {
  x: number;
  y: number;
}

export interface VisualItem {
  /** Opaque identity assigned at creation time; used as the key of every item map. */
  readonly handle: number;
  readonly kind: ItemKind;
  /** Animations sharing this item as background must play one after another. */
  readonly requireSerialization: boolean;
  position: Point;
  clone(): VisualItem;
}

/** Capability consumed by the placement engine. */
export interface Placeable {
  getPlacementWidth(): number;
  getPlacementHeight(): number;
  getPlacementMarker(): number;
  setPlacementCorner(row: number, col: number): void;
}

export type PlaceableItem = VisualItem & Placeable;

export type PlacementKey = string | number;

export type ColorKey = string | number;

/** Camera framing: `scale` is relative to the previous frame, `origin` is absolute. */
export interface CameraFrame {
  scale: number;
  origin: Point;
}

// Placement markers
export const MARK_FREE = 0;
export const MARK_MARGIN = 1;
export const MARK_REGISTER = 2;
export const MARK_FUNCTION = 3;
export const MARK_MEMORY = 4;

export function isPlaceable(item: VisualItem): item is PlaceableItem {
  return (
    "getPlacementWidth" in item &&
    typeof item.getPlacementWidth === "function" &&
    "getPlacementHeight" in item &&
    typeof item.getPlacementHeight === "function" &&
    "getPlacementMarker" in item &&
    typeof item.getPlacementMarker === "function" &&
    "setPlacementCorner" in item &&
    typeof item.setPlacementCorner === "function"
  );
}

/** An item that owns secondary items on stage (memory marks). */
export interface Decorated {
  attachedItems(): VisualItem[];
}

export function isDecorated(item: VisualItem): item is VisualItem & Decorated {
  return "attachedItems" in item && typeof item.attachedItems === "function";
}

/** Identity membership by handle. */
export function containsItem(list: readonly VisualItem[], item: VisualItem): boolean {
  return list.some((x) => x.handle === item.handle);
}

/** Normalise an optional item / list argument into a list without duplicates. */
export function toItemList<T extends VisualItem>(arg: T | readonly (T | null | undefined)[] | null | undefined): T[] {
  if (arg == null) return [];
  const raw: readonly (T | null | undefined)[] = isItemArray(arg) ? arg : [arg];
  const seen = new Set<number>();
  const out: T[] = [];
  for (const item of raw) {
    if (item == null || seen.has(item.handle)) continue;
    seen.add(item.handle);
    out.push(item);
  }
  return out;
}

function isItemArray<T>(arg: T | readonly (T | null | undefined)[]): arg is readonly (T | null | undefined)[] {
  return Array.isArray(arg);
}

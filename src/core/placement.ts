/**
 * core/placement.ts
 * Rectangle packer over a resizable occupancy grid. Each cell holds 0 (free), 1 (margin) or the
 * marker of the occupant. Every rectangle is written with a one-cell margin around it, and a row
 * band may only be shared with occupants carrying the same marker.
 */
import type { SceneConfig } from "../config/schema";
import type { PlaceableItem, PlacementKey, Point, VisualItem } from "../types/isa";
import { MARK_FREE, MARK_MARGIN, isPlaceable } from "../types/isa";
import { InvalidArgumentError, UnknownItemError } from "../utils/errors";
import { logDebug } from "../utils/logger";

export type PlacementCorner = [row: number, col: number];

export interface PlacementItem {
  key: PlacementKey;
  item: PlaceableItem;
  row: number;
  col: number;
}

export type PlacementOptions = Pick<SceneConfig, "frameWidth" | "frameHeight" | "placementStrategy">;

interface Rect {
  width: number;
  height: number;
  marker: number;
}

export class PlacementEngine {
  private grid: number[][] = [];
  private width = 0;
  private height = 0;
  private readonly hvRatio: number;
  private readonly entries = new Map<PlacementKey, PlacementItem>();

  constructor(private readonly options: PlacementOptions) {
    this.hvRatio = options.frameHeight / options.frameWidth;
    this.resize(options.frameWidth, options.frameHeight);
  }

  // ---- queries ----

  size(): { width: number; height: number } {
    return { width: this.width, height: this.height };
  }

  cell(row: number, col: number): number {
    if (!this.inBounds(row, col)) {
      throw new InvalidArgumentError(`Cell (${row}, ${col}) outside ${this.width}x${this.height} grid`);
    }
    return this.grid[row][col];
  }

  has(key: PlacementKey): boolean {
    return this.entries.has(key);
  }

  get(key: PlacementKey): PlaceableItem {
    return this.entry(key).item;
  }

  /** Top-left corner of a placed item. */
  positionOf(key: PlacementKey): PlacementCorner {
    const entry = this.entry(key);
    return [entry.row, entry.col];
  }

  keyOf(item: VisualItem): PlacementKey | undefined {
    for (const entry of this.entries.values()) {
      if (entry.item.handle === item.handle) return entry.key;
    }
    return undefined;
  }

  placedItems(): PlacementItem[] {
    return [...this.entries.values()].map((e) => ({ ...e }));
  }

  /** Columns up to the last one holding a margin or an occupant. */
  occupiedWidth(): number {
    let maxCol = 0;
    for (let col = 0; col < this.width; col++) {
      for (let row = 0; row < this.height; row++) {
        if (this.grid[row][col] > MARK_FREE) {
          maxCol = col;
          break;
        }
      }
    }
    return maxCol + 1;
  }

  occupiedHeight(): number {
    let maxRow = 0;
    for (let row = 0; row < this.height; row++) {
      if (this.grid[row].some((v) => v > MARK_FREE)) maxRow = row;
    }
    return maxRow + 1;
  }

  /** Centre of the occupied box. */
  origin(): Point {
    return { x: this.occupiedWidth() / 2, y: this.occupiedHeight() / 2 };
  }

  /** Zoom factor that fits the occupied box (plus one unit) into a camera of the given size. */
  scaleFor(cameraWidth: number, cameraHeight: number): number {
    return Math.max((this.occupiedHeight() + 1) / cameraHeight, (this.occupiedWidth() + 1) / cameraWidth);
  }

  /** Text picture of the grid: space free, `*` margin, `O` occupied. */
  dump(): string {
    return this.grid
      .map((row) => row.map((v) => (v === MARK_FREE ? " " : v === MARK_MARGIN ? "*" : "O")).join(""))
      .join("\n");
  }

  // ---- mutation ----

  /**
   * Place one item and return its corner. With `alignWith`, the search is restricted to the row
   * of that already placed item; an unknown key places normally.
   */
  place(item: VisualItem, key?: PlacementKey, alignWith?: PlacementKey | VisualItem): PlacementCorner {
    const placeable = requirePlaceable(item);
    const placementKey = key ?? placeable.handle;
    const existing = this.entries.get(placementKey);
    if (existing) {
      if (existing.item.handle !== placeable.handle) {
        throw new InvalidArgumentError(`Placement key ${String(placementKey)} already used by another item`, {
          key: placementKey,
        });
      }
      return [existing.row, existing.col];
    }

    const rect = rectOf(placeable);
    const [row, col] = this.search(rect, this.alignRow(alignWith));
    this.commit(placementKey, placeable, row, col);
    return [row, col];
  }

  /**
   * Place a list of items as one matrix block. `forceRatio` is `[rows, cols]`; only the column
   * count is used, rows follow from the item count. Corners come back in input order; items
   * already placed under their key keep their corner and stay out of the block.
   */
  placeGroup(items: VisualItem[], keys?: PlacementKey[], forceRatio?: [number, number]): PlacementCorner[] {
    if (items.length === 0) throw new InvalidArgumentError("Cannot place an empty group");
    if (keys && keys.length !== items.length) {
      throw new InvalidArgumentError(`Group has ${items.length} items but ${keys.length} keys`);
    }
    const placeables = items.map(requirePlaceable);
    const groupKeys = placeables.map((p, i) => keys?.[i] ?? p.handle);
    const corners: PlacementCorner[] = new Array<PlacementCorner>(placeables.length);
    const pending: number[] = [];
    for (let i = 0; i < placeables.length; i++) {
      const existing = this.entries.get(groupKeys[i]);
      if (!existing) {
        pending.push(i);
      } else if (existing.item.handle !== placeables[i].handle) {
        throw new InvalidArgumentError(`Placement key ${String(groupKeys[i])} already used by another item`);
      } else {
        corners[i] = [existing.row, existing.col];
      }
    }
    if (pending.length === 0) return corners;

    const split = forceRatio ? forceRatio[1] : this.autoSplit(pending.map((i) => placeables[i]));
    if (!Number.isInteger(split) || split <= 0) {
      throw new InvalidArgumentError(`Group column count must be a positive integer, got ${split}`);
    }

    // Each matrix row is filled right to left so the first item ends up at the right edge.
    const matrix: number[][] = [];
    for (let left = 0; left < pending.length; left += split) {
      matrix.push(pending.slice(left, left + split).reverse());
    }
    const rowWidths = matrix.map((r) => r.reduce((acc, i) => acc + rectOf(placeables[i]).width, 0) + r.length - 1);
    const rowHeights = matrix.map((r) => Math.max(...r.map((i) => rectOf(placeables[i]).height)));
    const blockWidth = Math.max(...rowWidths);
    const blockHeight = rowHeights.reduce((a, b) => a + b, 0) + matrix.length - 1;

    const [blockRow, blockCol] = this.search({ width: blockWidth, height: blockHeight, marker: MARK_FREE }, null);

    let row = blockRow;
    matrix.forEach((indices, r) => {
      let col = blockCol;
      for (const i of indices) {
        const rect = rectOf(placeables[i]);
        this.force(rect, row, col);
        this.commit(groupKeys[i], placeables[i], row, col);
        corners[i] = [row, col];
        col += rect.width + 1;
      }
      row += rowHeights[r] + 1;
    });
    return corners;
  }

  /** Grow or shrink the grid. A shrink may not cut a placed item or its margin. */
  resize(newWidth: number, newHeight: number): void {
    if (!Number.isInteger(newWidth) || !Number.isInteger(newHeight) || newWidth <= 0 || newHeight <= 0) {
      throw new InvalidArgumentError(`Invalid grid size ${newWidth}x${newHeight}`);
    }
    for (const entry of this.entries.values()) {
      const rect = rectOf(entry.item);
      if (entry.col + rect.width + 1 > newWidth || entry.row + rect.height + 1 > newHeight) {
        throw new InvalidArgumentError(`Grid size ${newWidth}x${newHeight} would cut item ${String(entry.key)}`, {
          key: entry.key,
        });
      }
    }
    const next: number[][] = [];
    for (let row = 0; row < newHeight; row++) {
      const line = new Array<number>(newWidth).fill(MARK_FREE);
      if (row < this.height) {
        const keep = Math.min(newWidth, this.width);
        for (let col = 0; col < keep; col++) line[col] = this.grid[row][col];
      }
      next.push(line);
    }
    this.grid = next;
    this.width = newWidth;
    this.height = newHeight;
  }

  /**
   * Clear the map back to the frame size. Kept items are re-inserted in their original order, at
   * their old corner or (with `keepPositions = false`) wherever the search puts them.
   */
  reset(keepItems: readonly VisualItem[] = [], keepPositions = true): void {
    const keepHandles = new Set(keepItems.map((i) => i.handle));
    const kept = [...this.entries.values()].filter((e) => keepHandles.has(e.item.handle));

    this.entries.clear();
    this.grid = [];
    this.width = 0;
    this.height = 0;
    this.resize(this.options.frameWidth, this.options.frameHeight);

    for (const entry of kept) {
      const rect = rectOf(entry.item);
      if (keepPositions) {
        this.force(rect, entry.row, entry.col);
        this.commit(entry.key, entry.item, entry.row, entry.col);
      } else {
        const [row, col] = this.search(rect, null);
        this.commit(entry.key, entry.item, row, col);
      }
    }
  }

  // ─── Helpers ───

  private entry(key: PlacementKey): PlacementItem {
    const entry = this.entries.get(key);
    if (!entry) throw new UnknownItemError(key);
    return entry;
  }

  private alignRow(alignWith: PlacementKey | VisualItem | undefined): number | null {
    if (alignWith === undefined) return null;
    const key = typeof alignWith === "object" ? this.keyOf(alignWith) : alignWith;
    if (key === undefined) return null;
    return this.entries.get(key)?.row ?? null;
  }

  private commit(key: PlacementKey, item: PlaceableItem, row: number, col: number): void {
    item.setPlacementCorner(row, col);
    this.entries.set(key, { key, item, row, col });
  }

  /** Search with growth until a corner is found. */
  private search(rect: Rect, alignRow: number | null): PlacementCorner {
    for (;;) {
      if (alignRow !== null) {
        const aligned = this.findInRow(rect, alignRow);
        if (aligned) return this.mark(rect, aligned);
        // An incompatible row never accepts the item, however wide the grid grows.
        const roomy =
          this.width >= this.occupiedWidth() + rect.width + 3 && this.height >= alignRow + rect.height + 2;
        if (roomy) alignRow = null;
      }
      if (alignRow === null) {
        const found = this.find(rect);
        if (found) return this.mark(rect, found);
      }
      this.grow();
    }
  }

  /** Mark at an exact corner, growing while the rectangle exceeds the grid. */
  private force(rect: Rect, row: number, col: number): void {
    for (;;) {
      if (this.checkRect(row, col, rect)) {
        this.mark(rect, [row, col]);
        return;
      }
      if (this.fitsBounds(row, col, rect)) {
        throw new InvalidArgumentError(`Cannot place ${rect.width}x${rect.height} item at (${row}, ${col}): occupied`);
      }
      this.grow();
    }
  }

  private find(rect: Rect): PlacementCorner | null {
    const maxRow = this.height - rect.height;
    const maxCol = this.width - rect.width;
    if (this.options.placementStrategy === "RB") {
      for (let row = 1; row <= maxRow; row++) {
        for (let col = 1; col <= maxCol; col++) {
          if (this.grid[row][col] === MARK_FREE && this.checkRect(row, col, rect)) return [row, col];
        }
      }
    } else {
      for (let col = 1; col <= maxCol; col++) {
        for (let row = 1; row <= maxRow; row++) {
          if (this.grid[row][col] === MARK_FREE && this.checkRect(row, col, rect)) return [row, col];
        }
      }
    }
    return null;
  }

  private findInRow(rect: Rect, row: number): PlacementCorner | null {
    if (row >= this.height) return null;
    for (let col = 1; col <= this.width - rect.width; col++) {
      if (this.grid[row][col] === MARK_FREE && this.checkRect(row, col, rect)) return [row, col];
    }
    return null;
  }

  private fitsBounds(row: number, col: number, rect: Rect): boolean {
    return row >= 1 && col >= 1 && col + rect.width + 1 <= this.width && row + rect.height + 1 <= this.height;
  }

  private checkRect(row: number, col: number, rect: Rect): boolean {
    if (!this.fitsBounds(row, col, rect)) return false;

    for (let r = row - 1; r <= row + rect.height; r++) {
      for (let c = col - 1; c <= col + rect.width; c++) {
        if (this.grid[r][c] > MARK_MARGIN) return false;
      }
    }
    // Occupants to the left on the same rows must carry the same marker.
    for (let r = row - 1; r <= row + rect.height; r++) {
      for (let c = 0; c < col - 1; c++) {
        const v = this.grid[r][c];
        if (v > MARK_MARGIN && v !== rect.marker) return false;
      }
    }
    return true;
  }

  private mark(rect: Rect, corner: PlacementCorner): PlacementCorner {
    const [row, col] = corner;
    for (let r = row - 1; r <= row + rect.height; r++) {
      for (let c = col - 1; c <= col + rect.width; c++) {
        if (!this.inBounds(r, c)) continue;
        const border = r === row - 1 || r === row + rect.height || c === col - 1 || c === col + rect.width;
        this.grid[r][c] = border ? MARK_MARGIN : rect.marker;
      }
    }
    return corner;
  }

  /** One growth step along the dimension that keeps the frame aspect ratio. Never shrinks. */
  private grow(): void {
    let nextWidth: number;
    let nextHeight: number;
    if (this.hvRatio > 1) {
      nextWidth = this.width + 1;
      nextHeight = Math.trunc(nextWidth * this.hvRatio);
    } else {
      nextHeight = this.height + 1;
      nextWidth = Math.trunc(nextHeight / this.hvRatio);
    }
    this.resize(Math.max(this.width, nextWidth), Math.max(this.height, nextHeight));
    logDebug("placement.grow", { width: this.width, height: this.height });
  }

  private autoSplit(items: PlaceableItem[]): number {
    const screenFactor = this.options.frameWidth / this.options.frameHeight;
    const count = items.length;
    const firstHeight = items[0].getPlacementHeight();
    let split = 1;
    while (split < count) {
      const tempWidth = items.slice(0, split).reduce((acc, i) => acc + i.getPlacementWidth(), 0) + split - 1;
      const rows = Math.floor(count / split);
      const tempHeight = firstHeight * rows + rows - 1;
      if (tempWidth / tempHeight > screenFactor) break;
      split *= 2;
    }
    return split;
  }

  private inBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.height && col >= 0 && col < this.width;
  }
}

function requirePlaceable(item: VisualItem): PlaceableItem {
  if (!isPlaceable(item)) {
    throw new InvalidArgumentError(`Item of kind ${item.kind} cannot be placed`, { handle: item.handle });
  }
  const rect = rectOf(item);
  if (!Number.isInteger(rect.width) || !Number.isInteger(rect.height) || rect.width <= 0 || rect.height <= 0) {
    throw new InvalidArgumentError(`Placement size must be positive integers, got ${rect.width}x${rect.height}`, {
      handle: item.handle,
    });
  }
  if (!Number.isInteger(rect.marker) || rect.marker < 2) {
    throw new InvalidArgumentError(`Placement marker must be an integer >= 2, got ${rect.marker}`);
  }
  return item;
}

function rectOf(item: PlaceableItem): Rect {
  return {
    width: item.getPlacementWidth(),
    height: item.getPlacementHeight(),
    marker: item.getPlacementMarker(),
  };
}

import type { SceneConfig } from "../config/schema";
import type { ColorKey } from "../types/isa";
import { InvalidArgumentError } from "../utils/errors";

/**
 * Round-robin palette allocation memoized per key. Callers pass an explicit tag (a label or a
 * value from `nextTag()`); a key seen again gets its earlier colours back.
 */
export class ColorMap {
  private readonly palette: readonly string[];
  private readonly assigned = new Map<ColorKey, string[]>();
  private index: number;
  private tagCounter = 0;

  readonly defaultColor: string;

  constructor(config: Pick<SceneConfig, "colorScheme" | "defaultColor">) {
    this.palette = [...config.colorScheme];
    this.defaultColor = config.defaultColor;
    this.index = this.palette.length - 1;
  }

  /** Fresh tag, never equal to an earlier one from this map. */
  nextTag(): string {
    this.tagCounter += 1;
    return `tag:${this.tagCounter}`;
  }

  /** Single colour for `key`; without a key a new colour is taken every call. */
  getColor(key?: ColorKey): string {
    return this.getColors(key ?? this.nextTag(), 1)[0];
  }

  /**
   * `count` colours for `key`. A memoized assignment of a different length is repeated or cut
   * to the requested length.
   */
  getColors(key: ColorKey, count: number): string[] {
    if (!Number.isInteger(count) || count <= 0) {
      throw new InvalidArgumentError(`Colour count must be a positive integer, got ${count}`);
    }
    const memo = this.assigned.get(key);
    if (memo) {
      return Array.from({ length: count }, (_, i) => memo[i % memo.length]);
    }
    const colors: string[] = [];
    for (let i = 0; i < count; i++) {
      this.index = (this.index + 1) % this.palette.length;
      colors.push(this.palette[this.index]);
    }
    this.assigned.set(key, colors);
    return [...colors];
  }

  /** Forget every assignment and rewind to the first palette entry. */
  reset(): void {
    this.assigned.clear();
    this.index = this.palette.length - 1;
  }
}

import type { Animation } from "../animate/primitives";
import { describeAnimation } from "../animate/primitives";
import type { VisualItem } from "../types/isa";
import type { SceneRenderer } from "./renderer";

export type RenderCommand =
  | { op: "add"; handles: number[] }
  | { op: "remove"; handles: number[] }
  | { op: "play"; animations: string[] }
  | { op: "wait"; seconds: number };

/**
 * Renderer that only writes down what it is asked to do. It also keeps the set of items on stage:
 * `fadeIn` puts items on stage, `fadeOut` and `transform` sources leave it.
 */
export class RecordingRenderer implements SceneRenderer {
  readonly commands: RenderCommand[] = [];
  private readonly stage = new Map<number, VisualItem>();

  add(items: readonly VisualItem[]): void {
    if (items.length === 0) return;
    items.forEach((i) => this.stage.set(i.handle, i));
    this.commands.push({ op: "add", handles: items.map((i) => i.handle) });
  }

  remove(items: readonly VisualItem[]): void {
    if (items.length === 0) return;
    items.forEach((i) => this.stage.delete(i.handle));
    this.commands.push({ op: "remove", handles: items.map((i) => i.handle) });
  }

  play(animations: readonly Animation[]): void {
    animations.forEach((a) => this.track(a));
    this.commands.push({ op: "play", animations: animations.map(describeAnimation) });
  }

  wait(seconds: number): void {
    this.commands.push({ op: "wait", seconds });
  }

  /** Handles on stage, ascending. */
  onStage(): number[] {
    return [...this.stage.keys()].sort((a, b) => a - b);
  }

  playCount(): number {
    return this.commands.filter((c) => c.op === "play").length;
  }

  private track(animation: Animation): void {
    switch (animation.kind) {
      case "fadeIn":
        animation.items.forEach((i) => this.stage.set(i.handle, i));
        return;
      case "fadeOut":
        animation.items.forEach((i) => this.stage.delete(i.handle));
        return;
      case "transform":
      case "fadeTransform":
        this.stage.delete(animation.from.handle);
        this.stage.set(animation.to.handle, animation.to);
        return;
      case "create":
        this.stage.set(animation.item.handle, animation.item);
        return;
      case "group":
      case "succession":
        animation.animations.forEach((a) => this.track(a));
        return;
      default:
        // moves, flashes, waits and camera changes leave the stage as it is
        return;
    }
  }
}

import type { Animation } from "../animate/primitives";
import type { VisualItem } from "../types/isa";

/**
 * Rendering collaborator. Calls arrive in play order; `play` receives the animations of one step,
 * all of which run at the same time (a camera reframe included).
 */
export interface SceneRenderer {
  add(items: readonly VisualItem[]): void;
  remove(items: readonly VisualItem[]): void;
  play(animations: readonly Animation[]): void;
  wait(seconds: number): void;
}

/**
 * scene/isaScene.ts
 * Section driver on top of the data flow: opens and closes sections, reframes the camera when the
 * occupied box changes, and replays the analysed steps against a renderer.
 */
import { camera as cameraAnimation, fadeIn } from "../animate/primitives";
import type { Step } from "../core/animationFlow";
import { TextUnit } from "../objects/text";
import type { SceneRenderer } from "../render/renderer";
import type { CameraFrame, PlacementKey, Point, VisualItem } from "../types/isa";
import { containsItem } from "../types/isa";
import { normalizeErrorMessage } from "../utils/errors";
import { logError, logEvent } from "../utils/logger";
import { IsaDataFlow } from "./dataFlow";

// Camera changes smaller than this are not worth an animation.
const CAMERA_EPSILON = 1e-3;

export interface StartSectionOptions {
  /** Clear the placement map, keeping always-on items at their corners. */
  resetPlacement?: boolean;
}

export interface EndSectionOptions {
  /** Seconds to hold the last step. */
  wait?: number;
  fadeOut?: boolean;
  /** Items (or their placement keys) that stay on stage through the fade-out. */
  keepItems?: ReadonlyArray<VisualItem | PlacementKey>;
  /** Kept items stay at their corners when the placement is reset. */
  keepPositions?: boolean;
}

export class IsaScene extends IsaDataFlow {
  private sectionCount = 0;
  private sectionTitle: string | undefined;
  private readonly alwaysOnItems: VisualItem[] = [];
  private cameraScale = 1;
  private cameraOrigin: Point = { x: 0, y: 0 };

  /** Open a section: colours restart from the head of the palette. */
  startSection(title?: string, options: StartSectionOptions = {}): void {
    this.colors.reset();
    if (options.resetPlacement) this.placement.reset(this.alwaysOnItems, true);
    this.sectionTitle = title;
    if (title) this.drawTitle(title);
  }

  /** Fade in a title above the diagram. */
  drawTitle(title: string): TextUnit {
    const text = new TextUnit(title, this.colors.defaultColor, { x: 0, y: -1 });
    this.flow.addAnimation({ animation: fadeIn(text), dst: text });
    return text;
  }

  /** Items kept through every fade-out, such as accumulators. */
  alwaysOn(...items: VisualItem[]): void {
    for (const item of items) {
      if (!containsItem(this.alwaysOnItems, item)) this.alwaysOnItems.push(item);
    }
  }

  /**
   * Close the current section. The camera frame needed for the current placement plays with the
   * section's first step. With `fadeOut`, everything but the kept items leaves the stage and the
   * placement map is reset.
   */
  endSection(options: EndSectionOptions = {}): void {
    const fadeOut = options.fadeOut ?? true;
    const keep = [...this.alwaysOnItems];
    for (const entry of options.keepItems ?? []) {
      const item = typeof entry === "object" ? entry : this.placement.get(entry);
      if (!containsItem(keep, item)) keep.push(item);
    }

    const animations = this.flow.pendingCount;
    const camera = this.updateCamera();
    this.flow.switchSection({ wait: options.wait ?? 0, fadeOut, camera, keepItems: keep, title: this.sectionTitle });

    if (fadeOut) this.placement.reset(keep, options.keepPositions ?? true);
    this.refcount.clearSources();

    logEvent("scene.section.closed", {
      section: this.sectionCount,
      animations,
      fadeOut,
      kept: keep.map((k) => k.handle),
    });
    if (animations > 0) this.sectionCount += 1;
    this.sectionTitle = undefined;
  }

  /** Close a dangling section and layer every section into steps. */
  build(): Step[] {
    if (this.flow.pendingCount > 0) this.endSection({ fadeOut: false });
    try {
      return this.flow.analyse();
    } catch (err) {
      logError("scene.build.failed", { error: normalizeErrorMessage(err) });
      throw err;
    }
  }

  /** Replay the steps: additions, removals, the concurrent animations, then the hold. */
  play(renderer: SceneRenderer): Step[] {
    const steps = this.build();
    for (const step of steps) {
      renderer.add(step.addBefore);
      renderer.remove(step.removeBefore);
      renderer.play(step.camera ? [cameraAnimation(step.camera), ...step.animations] : step.animations);
      renderer.add(step.addAfter);
      renderer.remove(step.removeAfter);
      if (step.wait > 0) renderer.wait(step.wait);
    }
    return steps;
  }

  /** Current absolute camera framing. */
  cameraFrame(): CameraFrame {
    return { scale: this.cameraScale, origin: { ...this.cameraOrigin } };
  }

  private updateCamera(): CameraFrame | null {
    const display = this.config.zoomedDisplay;
    const width = this.placement.occupiedWidth();
    const scale = this.placement.scaleFor(display.width, display.height);
    const origin = { x: width / 2, y: (display.height * scale) / 2 };

    const moved =
      Math.abs(scale - this.cameraScale) > CAMERA_EPSILON ||
      Math.abs(origin.x - this.cameraOrigin.x) > CAMERA_EPSILON ||
      Math.abs(origin.y - this.cameraOrigin.y) > CAMERA_EPSILON;
    if (!moved) return null;

    const frame = { scale: scale / this.cameraScale, origin };
    this.cameraScale = scale;
    this.cameraOrigin = origin;
    logEvent("scene.camera.reframe", { section: this.sectionCount, scale, origin });
    return frame;
  }
}

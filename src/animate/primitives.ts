// Abstract animation values. The core only builds and orders these; a SceneRenderer plays them.
import type { CameraFrame, Point, VisualItem } from "../types/isa";

export type Animation =
  | { kind: "fadeIn"; items: VisualItem[]; shift?: Point }
  | { kind: "fadeOut"; items: VisualItem[]; shift?: Point }
  | { kind: "transform"; from: VisualItem; to: VisualItem }
  | { kind: "fadeTransform"; from: VisualItem; to: VisualItem }
  | { kind: "moveTo"; item: VisualItem; target: Point }
  | { kind: "create"; item: VisualItem }
  | { kind: "indicate"; item: VisualItem; color?: string }
  | { kind: "wait"; duration: number }
  | { kind: "group"; animations: Animation[] }
  | { kind: "succession"; animations: Animation[] }
  | { kind: "camera"; frame: CameraFrame };

export type AnimationKind = Animation["kind"];

export const fadeIn = (items: VisualItem | VisualItem[], shift?: Point): Animation => ({
  kind: "fadeIn",
  items: Array.isArray(items) ? [...items] : [items],
  ...(shift ? { shift } : {}),
});

export const fadeOut = (items: VisualItem | VisualItem[], shift?: Point): Animation => ({
  kind: "fadeOut",
  items: Array.isArray(items) ? [...items] : [items],
  ...(shift ? { shift } : {}),
});

export const transform = (from: VisualItem, to: VisualItem): Animation => ({ kind: "transform", from, to });

export const fadeTransform = (from: VisualItem, to: VisualItem): Animation => ({ kind: "fadeTransform", from, to });

export const moveTo = (item: VisualItem, target: Point): Animation => ({ kind: "moveTo", item, target: { ...target } });

export const create = (item: VisualItem): Animation => ({ kind: "create", item });

export const indicate = (item: VisualItem, color?: string): Animation => ({
  kind: "indicate",
  item,
  ...(color ? { color } : {}),
});

export const wait = (duration = 1): Animation => ({ kind: "wait", duration });

export const group = (...animations: Animation[]): Animation => ({ kind: "group", animations });

export const succession = (...animations: Animation[]): Animation => ({ kind: "succession", animations });

export const camera = (frame: CameraFrame): Animation => ({
  kind: "camera",
  frame: { scale: frame.scale, origin: { ...frame.origin } },
});

/** Difference of two points, used for fade shifts. */
export function offset(to: Point, from: Point): Point {
  return { x: to.x - from.x, y: to.y - from.y };
}

/** Compact text form, e.g. `succession(moveTo(#3), transform(#3->#7))`. */
export function describeAnimation(animation: Animation): string {
  switch (animation.kind) {
    case "fadeIn":
    case "fadeOut":
      return `${animation.kind}(${animation.items.map((i) => `#${i.handle}`).join(",")})`;
    case "transform":
    case "fadeTransform":
      return `${animation.kind}(#${animation.from.handle}->#${animation.to.handle})`;
    case "moveTo":
    case "create":
    case "indicate":
      return `${animation.kind}(#${animation.item.handle})`;
    case "wait":
      return `wait(${animation.duration})`;
    case "group":
    case "succession":
      return `${animation.kind}(${animation.animations.map(describeAnimation).join(", ")})`;
    case "camera":
      return `camera(${animation.frame.scale.toFixed(3)})`;
    default: {
      const exhaustiveCheck: never = animation;
      return String(exhaustiveCheck);
    }
  }
}

/** Every item an animation touches, in first-seen order. */
export function itemsOf(animation: Animation): VisualItem[] {
  const out: VisualItem[] = [];
  const seen = new Set<number>();
  const push = (item: VisualItem) => {
    if (seen.has(item.handle)) return;
    seen.add(item.handle);
    out.push(item);
  };
  const walk = (a: Animation): void => {
    switch (a.kind) {
      case "fadeIn":
      case "fadeOut":
        a.items.forEach(push);
        return;
      case "transform":
      case "fadeTransform":
        push(a.from);
        push(a.to);
        return;
      case "moveTo":
      case "create":
      case "indicate":
        push(a.item);
        return;
      case "group":
      case "succession":
        a.animations.forEach(walk);
        return;
      case "wait":
      case "camera":
        return;
    }
  };
  walk(animation);
  return out;
}

export * from "./animate/primitives";
export * as registerAnimations from "./animate/registerAnimate";
export * as functionAnimations from "./animate/functionAnimate";
export * as memoryAnimations from "./animate/memoryAnimate";
export { createSceneConfig, formatValue } from "./config/runtime";
export { DEFAULT_COLOR_SCHEME, SceneConfig, PlacementStrategy } from "./config/schema";
export type { SceneConfigInput } from "./config/schema";
export { AnimationFlow, AnimationItem } from "./core/animationFlow";
export type { AnimationItemInit, AnimationState, Section, SectionOptions, Step } from "./core/animationFlow";
export { ColorMap } from "./core/colorMap";
export { PlacementEngine } from "./core/placement";
export type { PlacementCorner, PlacementItem, PlacementOptions } from "./core/placement";
export { RefCountTracker } from "./core/refcount";
export type { DuplicateRecord, ElementSource, RefCountEntry } from "./core/refcount";
export { ElementUnit } from "./objects/element";
export type { ElementOptions, ElementValue } from "./objects/element";
export { FunctionUnit } from "./objects/functionUnit";
export { MarkUnit } from "./objects/mark";
export { MemoryUnit, toAddress } from "./objects/memoryUnit";
export type { Address, MemoryOptions } from "./objects/memoryUnit";
export { RegisterUnit } from "./objects/register";
export { TextUnit } from "./objects/text";
export { RecordingRenderer } from "./render/recordingRenderer";
export type { RenderCommand } from "./render/recordingRenderer";
export type { SceneRenderer } from "./render/renderer";
export { IsaDataFlow } from "./scene/dataFlow";
export { IsaScene } from "./scene/isaScene";
export type { EndSectionOptions, StartSectionOptions } from "./scene/isaScene";
export * from "./types/isa";
export * from "./utils/errors";
export { logEvent, setLogLevel, setLogSink } from "./utils/logger";
export type { LogEvent, LogLevel, LogSink } from "./utils/logger";

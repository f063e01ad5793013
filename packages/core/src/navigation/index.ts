export type { DrawSurface, PageTrack, PageView, Position } from "./types.js";
export { createDrawQueue, type DrawQueue } from "./drawQueue.js";
export { createPositionMemory, type PositionMemory } from "./positionMemory.js";
export {
  createPageRegistry,
  type PageFactory,
  type PageRecord,
  type PageRegistry,
  type PageRegistryOptions,
} from "./pageRegistry.js";
export {
  createPageController,
  type PageController,
  type PageControllerOptions,
  type ScheduleFn,
  type StatusOptions,
} from "./pageController.js";

export { createTestSurface } from "./surface.js";
export type { TestSurface, TestSurfaceShow } from "./surface.js";

export { key } from "./keys.js";
export type { TestKeyModifiers } from "./keys.js";

export { createTestPage } from "./pages.js";
export type { TestPage, TestPageOptions } from "./pages.js";

export { TestBox } from "./testBox.js";
export type { TestBoxHandler, TestBoxOptions } from "./testBox.js";

export { createTestUi, drainUiEvents, runFrame } from "./ui.js";
export type { TestUi, TestUiOptions } from "./ui.js";

export { TestInputBuilder } from "./inputBuilder.js";

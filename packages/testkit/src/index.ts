export { createTempDir, removeDir, withTempDir, writeJsonFixture } from "./fs.js";
export { captureOutput, parseJsonOutput } from "./output.js";
export type { CapturedOutput } from "./output.js";

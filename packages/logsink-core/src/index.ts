export * from "./logger/index.js";
export { runDemo, type DemoOptions } from "./demo.js";

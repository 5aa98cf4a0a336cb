export { lowerProgram } from "./lower.js";
export { printFunction, printModule } from "./printer.js";
export * from "./types.js";

// CHANGE: Barrel for console output helpers

export { printError, printLines, printSection } from "./printer.js";

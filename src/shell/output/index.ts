// CHANGE: Central export file for output module

export { printAppError, printReport } from "./printer.js";

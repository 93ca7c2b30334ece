/**
 * Schema barrel export.
 */

export { NgEvent, NgLog } from "./log.js";

/**
 * Preflight module exports
 */

export { type PreflightDependencies, PreflightError, runPreflight } from "./validator";

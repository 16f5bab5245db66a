/**
 * Repository Exports
 */

export { runRepo } from "./run.repository.js";

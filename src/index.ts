/**
 * x12-claims-engine
 *
 * Library entry: the X12 pipeline, the claim model and its output records.
 */

export * from './x12/index.js';
export * from './model/index.js';
export { getLogger, initializeLogging, setGlobalLevel, shutdownLogging, LogLevel } from './logging/index.js';

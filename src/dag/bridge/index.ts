/**
 * @file Bridge Layer Re-exports
 *
 * @module dag/bridge
 */

export { Pipeline, DEFAULT_STORE_DIR } from './Pipeline.js';
export type { PipelineOptions, TargetSummary, RecordField } from './Pipeline.js';

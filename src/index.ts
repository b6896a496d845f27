/**
 * @file Package Entry
 *
 * Public surface: the `Pipeline` facade, the types it hands out, the
 * error taxonomy and the pieces embedders plug in (capabilities,
 * storage backends, renderers, settings, log handlers).
 *
 * @module
 */

export * from './dag/bridge/index.js';
export {
    CairnError,
    SpecError,
    TargetError,
    ArtifactError,
    RenderError,
    SerializationError,
    CaptureWarning,
} from './dag/errors.js';
export type { SpecErrorKind } from './dag/errors.js';

export { BUNDLED_CAPABILITIES, fsio, std } from './dag/capabilities/builtin.js';
export type { Capability, CapabilityFunction, CommandContext } from './dag/capabilities/types.js';

export type { ErrorMode, RunOptions, RunReport } from './dag/execution/types.js';
export type { FileArtifact, FingerprintRecord, JsonValue, TargetStatus } from './dag/fingerprint/types.js';
export type { Graph, GraphEdge, PipelineSpec, Result, Target, TargetDefinition } from './dag/graph/types.js';
export { pipeline_parse } from './dag/graph/parser/pipeline.js';
export type { Invalidation, OutdatedReason } from './dag/invalidation/outdated.js';

export { MarkdownRenderer } from './dag/literate/renderer.js';
export type { DocumentRenderer, RenderRequest } from './dag/literate/renderer.js';

export { MemoryBackend } from './dag/store/backend/memory.js';
export { NodeFsBackend } from './dag/store/backend/node.js';
export type { StorageBackend } from './dag/store/types.js';
export type { WorkspaceSnapshot } from './dag/workspace/types.js';

export { SettingsService, SETTINGS_FILE } from './config/settings.js';
export type { CairnSettings, SettingsKey, SettingSource } from './config/settings.js';
export { logger_create, logHandler_set, logLevel_set } from './logging/logger.js';
export type { LogEntry, LogHandler, LogLevel, Logger } from './logging/logger.js';

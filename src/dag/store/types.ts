/**
 * @file Store Type Definitions
 *
 * Types for the storage layer that persists what a run learned: one
 * fingerprint record, one serialized value and (after a failure) one
 * workspace snapshot per target. The store is backend-agnostic; the
 * same interface works against the real filesystem or memory.
 *
 * @module dag/store
 */

import type { FingerprintRecord, JsonValue } from '../fingerprint/types.js';
import type { WorkspaceSnapshot } from '../workspace/types.js';

// ─── Storage Backend Interface ──────────────────────────────────

/**
 * Backend-agnostic storage interface.
 *
 * The metadata store never touches I/O directly; all reads and writes
 * go through this interface. Methods follow the project's RPN naming
 * convention (subject_verb).
 */
export interface StorageBackend {
    /** Write data to a path. Creates parent directories as needed. Atomic per path. */
    artifact_write(path: string, data: string): Promise<void>;

    /** Read data from a path. Returns null if path doesn't exist. */
    artifact_read(path: string): Promise<string | null>;

    /** Check whether a path exists. */
    path_exists(path: string): Promise<boolean>;

    /** List immediate children of a path. Returns names, not full paths. Empty when absent. */
    children_list(path: string): Promise<string[]>;

    /** Remove a file or a directory tree. No-op if absent. */
    path_remove(path: string): Promise<void>;
}

// ─── Metadata Store Interface ───────────────────────────────────

/** Subdirectories of the store root. */
export const STORE_LAYOUT = {
    meta: 'meta',
    objects: 'objects',
    workspaces: 'workspaces',
} as const;

/**
 * Keyed persistence for records, values and workspaces.
 *
 * The store knows nothing about graphs or invalidation: it only
 * reads and writes what the scheduler hands it.
 */
export interface MetadataStoreInterface {
    record_write(record: FingerprintRecord): Promise<void>;
    /** Null when absent or unreadable. */
    record_read(name: string): Promise<FingerprintRecord | null>;
    records_read(): Promise<Map<string, FingerprintRecord>>;
    record_remove(name: string): Promise<void>;

    /** Persist the canonical serialized form of a target's value. */
    value_write(name: string, serialized: string): Promise<void>;
    value_read(name: string): Promise<JsonValue | null>;
    value_exists(name: string): Promise<boolean>;
    value_remove(name: string): Promise<void>;

    workspace_write(snapshot: WorkspaceSnapshot): Promise<void>;
    workspace_read(name: string): Promise<WorkspaceSnapshot | null>;
    workspaces_list(): Promise<string[]>;
    workspaces_purge(): Promise<number>;

    /** Drop every record and value; workspaces are left alone. */
    clear(): Promise<void>;
}

/**
 * @file Fingerprint Type Definitions
 *
 * Types for the per-target fingerprint records that make incremental
 * runs possible. A record remembers what a target's inputs looked like
 * (input digest and its parts) and what the target produced (output
 * digest, tracked files) the last time it ran.
 *
 * Content-addressed, not timestamp-based: mtimes only short-circuit
 * rehashing of files whose size and mtime are unchanged.
 *
 * @module dag/fingerprint
 */

// ─── Values ─────────────────────────────────────────────────────

/** Values that survive the canonical serializer. */
export type JsonValue =
    | null
    | boolean
    | number
    | string
    | JsonValue[]
    | { [key: string]: JsonValue };

// ─── File Artifact ──────────────────────────────────────────────

/**
 * One tracked path of a file target.
 *
 * @property path - Path as returned by the command (relative to the pipeline root, or absolute)
 * @property hash - SHA-256 of the file contents
 * @property mtime - Modification time in ms when hashed
 * @property size - Size in bytes when hashed
 * @property hashedAt - Wall clock in ms when the hash was taken
 */
export interface FileArtifact {
    path: string;
    hash: string;
    mtime: number;
    size: number;
    hashedAt: number;
}

// ─── Fingerprint Record ─────────────────────────────────────────

export type TargetStatus = 'ok' | 'error' | 'cancelled' | 'upstream_failed';

export type TargetVariant = 'code' | 'file' | 'literate';

export type TargetFormat = 'value' | 'file';

/**
 * Metadata persisted for one target after each run that reaches it.
 *
 * `outputDigest` is only meaningful when `status` is `'ok'`.
 *
 * @property dependencies - Upstream output digests observed when this target ran
 * @property packages - Capability name → version active for this target
 * @property documentDigest - Source digest of a literate document (null otherwise)
 * @property seconds - Wall time of the command
 * @property seed - Seed handed to the target's PRNG
 */
export interface FingerprintRecord {
    name: string;
    variant: TargetVariant;
    format: TargetFormat;
    inputDigest: string;
    commandDigest: string;
    packages: Record<string, string>;
    documentDigest: string | null;
    dependencies: Record<string, string>;
    outputDigest: string | null;
    files: FileArtifact[];
    timestamp: string;
    seconds: number;
    seed: number;
    status: TargetStatus;
    error: string | null;
    warnings: string[];
}

/** Components that feed a target's input digest. */
export interface InputDigestParts {
    variant: TargetVariant;
    commandDigest: string;
    packages: Record<string, string>;
    documentDigest: string | null;
    seed: number;
    dependencies: Record<string, string>;
}

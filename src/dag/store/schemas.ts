/**
 * @file Store Document Schemas
 *
 * Zod schemas for the JSON documents under the store directory. Reads
 * go through these so a hand-edited or truncated file surfaces as
 * "no record" instead of a malformed object.
 *
 * @module dag/store
 */

import { z } from 'zod';

import type { FileArtifact, FingerprintRecord, JsonValue } from '../fingerprint/types.js';
import type { WorkspaceSnapshot } from '../workspace/types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.null(),
        z.boolean(),
        z.number(),
        z.string(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ]),
);

const DigestMapSchema = z.record(z.string());

const FileArtifactSchema: z.ZodType<FileArtifact> = z.object({
    path:     z.string(),
    hash:     z.string(),
    mtime:    z.number(),
    size:     z.number(),
    hashedAt: z.number(),
});

const VariantSchema = z.enum(['code', 'file', 'literate']);

export const FingerprintRecordSchema: z.ZodType<FingerprintRecord> = z.object({
    name:           z.string(),
    variant:        VariantSchema,
    format:         z.enum(['value', 'file']),
    inputDigest:    z.string(),
    commandDigest:  z.string(),
    packages:       DigestMapSchema,
    documentDigest: z.string().nullable(),
    dependencies:   DigestMapSchema,
    outputDigest:   z.string().nullable(),
    files:          z.array(FileArtifactSchema),
    timestamp:      z.string(),
    seconds:        z.number(),
    seed:           z.number(),
    status:         z.enum(['ok', 'error', 'cancelled', 'upstream_failed']),
    error:          z.string().nullable(),
    warnings:       z.array(z.string()),
});

export const WorkspaceSnapshotSchema: z.ZodType<WorkspaceSnapshot> = z.object({
    target:       z.string(),
    variant:      VariantSchema,
    command:      z.string(),
    document:     z.string().nullable(),
    bindings:     z.record(JsonValueSchema),
    omitted:      z.array(z.string()),
    capabilities: DigestMapSchema,
    seed:         z.number(),
    error:        z.string(),
    timestamp:    z.string(),
});

/**
 * @file Metadata Store
 *
 * Persists fingerprint records, serialized values and workspace
 * snapshots through a StorageBackend. Layout under the store root:
 *
 *   meta/<name>.json        FingerprintRecord
 *   objects/<name>.json     canonical JSON of the target's value
 *   workspaces/<name>.json  WorkspaceSnapshot
 *
 * Each file is written with one backend call, so a record is replaced
 * atomically on backends that support it.
 *
 * @module dag/store
 */

import type { ZodType } from 'zod';

import type { MetadataStoreInterface, StorageBackend } from './types.js';
import { STORE_LAYOUT } from './types.js';
import { FingerprintRecordSchema, JsonValueSchema, WorkspaceSnapshotSchema } from './schemas.js';
import type { FingerprintRecord, JsonValue } from '../fingerprint/types.js';
import type { WorkspaceSnapshot } from '../workspace/types.js';
import { value_serialize } from '../fingerprint/serialize.js';
import { errorMessage_extract } from '../errors.js';
import { logger_create } from '../../logging/logger.js';
import type { Logger } from '../../logging/logger.js';

const SUFFIX = '.json';

export class MetadataStore implements MetadataStoreInterface {
    private readonly log: Logger;

    constructor(
        private readonly backend: StorageBackend,
        private readonly rootPath: string,
    ) {
        this.log = logger_create({ component: 'store' });
    }

    /** Directory this store writes under. */
    get root(): string {
        return this.rootPath;
    }

    private path_build(section: string, name?: string): string {
        const dir: string = `${this.rootPath}/${section}`;
        return name === undefined ? dir : `${dir}/${name}${SUFFIX}`;
    }

    // ─── Records ────────────────────────────────────────────────

    async record_write(record: FingerprintRecord): Promise<void> {
        await this.backend.artifact_write(this.path_build(STORE_LAYOUT.meta, record.name), value_serialize(record));
    }

    async record_read(name: string): Promise<FingerprintRecord | null> {
        return this.document_read(this.path_build(STORE_LAYOUT.meta, name), FingerprintRecordSchema);
    }

    async records_read(): Promise<Map<string, FingerprintRecord>> {
        const records: Map<string, FingerprintRecord> = new Map();
        for (const name of await this.names_list(STORE_LAYOUT.meta)) {
            const record: FingerprintRecord | null = await this.record_read(name);
            if (record) records.set(name, record);
        }
        return records;
    }

    async record_remove(name: string): Promise<void> {
        await this.backend.path_remove(this.path_build(STORE_LAYOUT.meta, name));
    }

    // ─── Values ─────────────────────────────────────────────────

    async value_write(name: string, serialized: string): Promise<void> {
        await this.backend.artifact_write(this.path_build(STORE_LAYOUT.objects, name), serialized);
    }

    async value_read(name: string): Promise<JsonValue | null> {
        return this.document_read(this.path_build(STORE_LAYOUT.objects, name), JsonValueSchema);
    }

    async value_exists(name: string): Promise<boolean> {
        return this.backend.path_exists(this.path_build(STORE_LAYOUT.objects, name));
    }

    async value_remove(name: string): Promise<void> {
        await this.backend.path_remove(this.path_build(STORE_LAYOUT.objects, name));
    }

    // ─── Workspaces ─────────────────────────────────────────────

    async workspace_write(snapshot: WorkspaceSnapshot): Promise<void> {
        await this.backend.artifact_write(
            this.path_build(STORE_LAYOUT.workspaces, snapshot.target),
            value_serialize(snapshot),
        );
    }

    async workspace_read(name: string): Promise<WorkspaceSnapshot | null> {
        return this.document_read(this.path_build(STORE_LAYOUT.workspaces, name), WorkspaceSnapshotSchema);
    }

    async workspaces_list(): Promise<string[]> {
        return this.names_list(STORE_LAYOUT.workspaces);
    }

    async workspaces_purge(): Promise<number> {
        const names: string[] = await this.workspaces_list();
        await this.backend.path_remove(this.path_build(STORE_LAYOUT.workspaces));
        return names.length;
    }

    // ─── Whole Store ────────────────────────────────────────────

    async clear(): Promise<void> {
        await this.backend.path_remove(this.path_build(STORE_LAYOUT.meta));
        await this.backend.path_remove(this.path_build(STORE_LAYOUT.objects));
    }

    // ─── Internals ──────────────────────────────────────────────

    private async names_list(section: string): Promise<string[]> {
        const children: string[] = await this.backend.children_list(this.path_build(section));
        return children
            .filter((child: string) => child.endsWith(SUFFIX))
            .map((child: string) => child.slice(0, -SUFFIX.length))
            .sort();
    }

    private async document_read<T>(path: string, schema: ZodType<T>): Promise<T | null> {
        const raw: string | null = await this.backend.artifact_read(path);
        if (raw === null) return null;

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error: unknown) {
            this.log.warn('Ignoring unreadable store file', { path, reason: errorMessage_extract(error) });
            return null;
        }
        const result = schema.safeParse(parsed);
        if (!result.success) {
            this.log.warn('Ignoring malformed store file', { path, reason: result.error.issues[0]?.message ?? 'invalid' });
            return null;
        }
        return result.data;
    }
}

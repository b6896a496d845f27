/**
 * @file In-Memory Storage Backend
 *
 * StorageBackend over a flat Map of normalized paths. Directories are
 * implied by the files written beneath them. Used
 * by tests and by throwaway pipelines that should leave nothing on disk.
 *
 * @module dag/store/backend
 */

import { posix } from 'path';

import type { StorageBackend } from '../types.js';

export class MemoryBackend implements StorageBackend {
    private readonly files: Map<string, string> = new Map();
    private readonly dirs: Set<string> = new Set(['/']);

    async artifact_write(target: string, data: string): Promise<void> {
        const normalized: string = path_normalize(target);
        this.dirs_add(posix.dirname(normalized));
        this.files.set(normalized, data);
    }

    async artifact_read(target: string): Promise<string | null> {
        return this.files.get(path_normalize(target)) ?? null;
    }

    async path_exists(target: string): Promise<boolean> {
        const normalized: string = path_normalize(target);
        return this.files.has(normalized) || this.dirs.has(normalized);
    }

    async children_list(target: string): Promise<string[]> {
        const normalized: string = path_normalize(target);
        const prefix: string = normalized === '/' ? '/' : `${normalized}/`;
        const names: Set<string> = new Set();
        for (const entry of [...this.files.keys(), ...this.dirs]) {
            if (!entry.startsWith(prefix) || entry === normalized) continue;
            const head: string = entry.slice(prefix.length).split('/')[0];
            if (head) names.add(head);
        }
        return Array.from(names).sort();
    }

    private dirs_add(normalized: string): void {
        let current: string = normalized;
        while (!this.dirs.has(current)) {
            this.dirs.add(current);
            current = posix.dirname(current);
        }
    }

    async path_remove(target: string): Promise<void> {
        const normalized: string = path_normalize(target);
        const prefix: string = `${normalized}/`;
        for (const key of Array.from(this.files.keys())) {
            if (key === normalized || key.startsWith(prefix)) this.files.delete(key);
        }
        for (const dir of Array.from(this.dirs)) {
            if (dir !== '/' && (dir === normalized || dir.startsWith(prefix))) this.dirs.delete(dir);
        }
    }
}

function path_normalize(target: string): string {
    const normalized: string = posix.normalize(posix.join('/', target));
    return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

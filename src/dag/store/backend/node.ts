/**
 * @file Filesystem Storage Backend
 *
 * StorageBackend over `fs/promises`. Every write lands in a sibling
 * temp file first and is renamed into place, so a reader sees either
 * the old content or the new one, never a torn file.
 *
 * @module dag/store/backend
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import type { StorageBackend } from '../types.js';
import { errorCode_get } from '../../errors.js';

export class NodeFsBackend implements StorageBackend {
    constructor(private readonly root: string = '') {}

    private path_resolve(target: string): string {
        return this.root ? path.resolve(this.root, target) : path.resolve(target);
    }

    async artifact_write(target: string, data: string): Promise<void> {
        const finalPath: string = this.path_resolve(target);
        const random: string = Math.random().toString(36).slice(2, 10);
        const tempPath: string = path.join(path.dirname(finalPath), `.tmp-${path.basename(finalPath)}-${random}`);
        await fs.mkdir(path.dirname(finalPath), { recursive: true });
        await fs.writeFile(tempPath, data, 'utf-8');
        try {
            await fs.rename(tempPath, finalPath);
        } catch (error: unknown) {
            await fs.rm(tempPath, { force: true });
            throw error;
        }
    }

    async artifact_read(target: string): Promise<string | null> {
        try {
            return await fs.readFile(this.path_resolve(target), 'utf-8');
        } catch (error: unknown) {
            if (missing_is(error)) return null;
            throw error;
        }
    }

    async path_exists(target: string): Promise<boolean> {
        try {
            await fs.stat(this.path_resolve(target));
            return true;
        } catch (error: unknown) {
            if (missing_is(error)) return false;
            throw error;
        }
    }

    async children_list(target: string): Promise<string[]> {
        try {
            const names: string[] = await fs.readdir(this.path_resolve(target));
            return names.filter((name: string) => !name.startsWith('.tmp-')).sort();
        } catch (error: unknown) {
            if (missing_is(error)) return [];
            throw error;
        }
    }

    async path_remove(target: string): Promise<void> {
        await fs.rm(this.path_resolve(target), { recursive: true, force: true });
    }
}

function missing_is(error: unknown): boolean {
    const code: string | undefined = errorCode_get(error);
    return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * @file File-Target Tracker
 *
 * Turns the paths a file target returns into FileArtifacts and checks
 * them later. All paths of one target form a single unit: if any is
 * missing or changed, the target is outdated as a whole.
 *
 * @module dag/files
 */

import { isAbsolute, resolve } from 'path';
import { rm } from 'fs/promises';

import { ArtifactError } from '../errors.js';
import { artifact_fingerprint } from '../fingerprint/hasher.js';
import type { FileArtifact } from '../fingerprint/types.js';

/**
 * @property root - Directory relative paths resolve against
 * @property trustTimestamps - Reuse recorded hashes when size and mtime match (default true)
 */
export interface TrackerOptions {
    root: string;
    trustTimestamps?: boolean;
}

/**
 * Normalize what a file command returned into a list of paths.
 *
 * @throws ArtifactError when the value is not a path or a non-empty list of paths
 */
export function paths_normalize(target: string, returned: unknown): string[] {
    if (typeof returned === 'string' && returned.length > 0) return [returned];
    if (
        Array.isArray(returned) &&
        returned.length > 0 &&
        returned.every((item: unknown) => typeof item === 'string' && item.length > 0)
    ) {
        const paths: string[] = returned.filter((item: unknown): item is string => typeof item === 'string');
        return Array.from(new Set(paths));
    }
    const shape: string = Array.isArray(returned) ? 'a list that is empty or holds non-paths' : describe_value(returned);
    throw new ArtifactError(target, `Target '${target}' must return a file path or a list of file paths, got ${shape}`);
}

function describe_value(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value === 'string') return 'an empty string';
    return typeof value;
}

export class FileTracker {
    private readonly root: string;
    private readonly trustTimestamps: boolean;

    constructor(options: TrackerOptions) {
        this.root = options.root;
        this.trustTimestamps = options.trustTimestamps ?? true;
    }

    path_resolve(filePath: string): string {
        return isAbsolute(filePath) ? filePath : resolve(this.root, filePath);
    }

    /**
     * Fingerprint the files a command just produced.
     *
     * @throws ArtifactError when the value is not a path list or a path does not exist
     */
    async materialize(target: string, returned: unknown): Promise<FileArtifact[]> {
        const artifacts: FileArtifact[] = [];
        for (const filePath of paths_normalize(target, returned)) {
            const artifact: FileArtifact | null = await artifact_fingerprint(filePath, this.path_resolve(filePath));
            if (!artifact) {
                throw new ArtifactError(target, `Target '${target}' returned '${filePath}' but no such file exists`);
            }
            artifacts.push(artifact);
        }
        return artifacts;
    }

    /**
     * Current state of recorded artifacts, in the same order. A missing
     * path yields null.
     */
    async refresh(artifacts: FileArtifact[]): Promise<Array<FileArtifact | null>> {
        const current: Array<FileArtifact | null> = [];
        for (const recorded of artifacts) {
            current.push(await artifact_fingerprint(
                recorded.path,
                this.path_resolve(recorded.path),
                this.trustTimestamps ? recorded : null,
            ));
        }
        return current;
    }

    /** True when every recorded path exists with its recorded content. */
    async check(artifacts: FileArtifact[]): Promise<boolean> {
        const current: Array<FileArtifact | null> = await this.refresh(artifacts);
        return artifacts.every((recorded: FileArtifact, i: number) => current[i]?.hash === recorded.hash);
    }

    /** Delete tracked files. Missing paths are ignored. */
    async remove(artifacts: FileArtifact[]): Promise<void> {
        for (const artifact of artifacts) {
            await rm(this.path_resolve(artifact.path), { force: true });
        }
    }
}

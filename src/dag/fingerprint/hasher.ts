/**
 * @file Fingerprint Hasher
 *
 * Computes SHA-256 fingerprints for values, command text, files and
 * target inputs. The input digest of a target incorporates its own
 * command/capability/document digests and the output digests of all
 * of its dependencies, forming the Merkle chain that invalidation
 * walks.
 *
 * Parent (dependency) digests are sorted by name before hashing so the
 * result is independent of declaration order.
 *
 * @module dag/fingerprint
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import type { Stats } from 'fs';
import type { FileArtifact, InputDigestParts } from './types.js';
import { value_serialize } from './serialize.js';
import { errorCode_get } from '../errors.js';

/** SHA-256 hex digest of a string. */
export function digest_text(text: string): string {
    return createHash('sha256').update(text).digest('hex');
}

/**
 * Digest of a value's canonical serialization.
 *
 * @throws SerializationError when the value has no canonical form
 */
export function digest_value(value: unknown): string {
    return digest_text(value_serialize(value));
}

/** Streamed SHA-256 of a file's contents. */
export function digest_file(filePath: string): Promise<string> {
    return new Promise<string>((resolvePromise, rejectPromise) => {
        const hash = createHash('sha256');
        const stream = createReadStream(filePath);
        stream.on('error', rejectPromise);
        stream.on('data', (chunk: string | Buffer) => hash.update(chunk));
        stream.on('end', () => resolvePromise(hash.digest('hex')));
    });
}

/**
 * Compute a fingerprint from content and parent fingerprints.
 *
 * Formula: hash(content + '\0' + sorted parent entries)
 *
 * @param content - Serialized own content
 * @param parentFingerprints - Map of parent name → fingerprint
 */
export function fingerprint_compute(
    content: string,
    parentFingerprints: Record<string, string>,
): string {
    const parentPart = Object.entries(parentFingerprints)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => `${k}:${v}`)
        .join(',');

    return digest_text(content + '\0' + parentPart);
}

/** Capability versions as one order-independent token. */
export function packages_token(packages: Record<string, string>): string {
    return Object.keys(packages)
        .sort()
        .map((name: string) => `${name}@${packages[name]}`)
        .join(',');
}

/** Input digest of a target: own parts chained to dependency outputs. */
export function inputDigest_compute(parts: InputDigestParts): string {
    const own: string = [
        parts.variant,
        parts.commandDigest,
        packages_token(parts.packages),
        parts.documentDigest ?? '',
        String(parts.seed),
    ].join('|');
    return fingerprint_compute(own, parts.dependencies);
}

/** Output digest of a file target: the sorted (path, hash) set. */
export function filesDigest_compute(artifacts: FileArtifact[]): string {
    const pairs: string[][] = artifacts
        .map((artifact: FileArtifact) => [artifact.path, artifact.hash])
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return digest_value(pairs);
}

/**
 * Filesystem timestamp resolution assumed when deciding whether an
 * mtime is trustworthy. A file whose mtime falls within this window of
 * the moment it was hashed may have been rewritten without its mtime
 * moving, so it is always rehashed.
 */
export const MTIME_RESOLUTION_MS = 2000;

/**
 * Hash one path into a FileArtifact.
 *
 * When `previous` describes the same path with the same size and
 * mtime, and was hashed well after that mtime, its hash is reused
 * instead of rereading the file.
 *
 * @returns null when the path does not exist or is not a regular file
 */
export async function artifact_fingerprint(
    filePath: string,
    absolutePath: string,
    previous: FileArtifact | null = null,
): Promise<FileArtifact | null> {
    let info: Stats;
    try {
        info = await stat(absolutePath);
    } catch (error: unknown) {
        const code: string | undefined = errorCode_get(error);
        if (code === 'ENOENT' || code === 'ENOTDIR') return null;
        throw error;
    }
    if (!info.isFile()) return null;

    const mtime: number = info.mtimeMs;
    const size: number = info.size;
    if (
        previous &&
        previous.path === filePath &&
        previous.mtime === mtime &&
        previous.size === size &&
        previous.hashedAt - previous.mtime >= MTIME_RESOLUTION_MS
    ) {
        return { ...previous };
    }

    const hashedAt: number = Date.now();
    return {
        path: filePath,
        hash: await digest_file(absolutePath),
        mtime,
        size,
        hashedAt,
    };
}

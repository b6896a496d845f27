/**
 * @file Target Digests
 *
 * The parts of a target's identity that do not depend on upstream
 * results: its command (or document location), its capability
 * versions and, for literate targets, the document source.
 *
 * @module dag/invalidation
 */

import { digest_text } from '../fingerprint/hasher.js';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { Target } from '../graph/types.js';

export interface TargetDigests {
    commandDigest: string;
    documentDigest: string | null;
    packages: Record<string, string>;
}

export function target_digests(target: Target, capabilities: CapabilityRegistry): TargetDigests {
    const packages: Record<string, string> = capabilities.versions_resolve(target.packages);
    if (target.variant === 'literate') {
        return {
            commandDigest: digest_text(`document:${target.document}\noutput:${target.output ?? ''}`),
            documentDigest: digest_text(target.source),
            packages,
        };
    }
    return {
        commandDigest: digest_text(`${target.format}:${target.commandText}`),
        documentDigest: null,
        packages,
    };
}

/**
 * @file Workspace Type Definitions
 *
 * A workspace is the frozen environment of a failed target: enough to
 * re-evaluate its command outside the scheduler and hit the same error.
 *
 * @module dag/workspace
 */

import type { JsonValue, TargetVariant } from '../fingerprint/types.js';

/**
 * @property command - Canonical command text, or the document source for literate targets
 * @property document - Document path of a literate target
 * @property bindings - Free variables and read/load targets → their values at failure
 * @property omitted - Bindings that had no serializable form
 * @property capabilities - Capability name → version active for the target
 */
export interface WorkspaceSnapshot {
    target: string;
    variant: TargetVariant;
    command: string;
    document: string | null;
    bindings: Record<string, JsonValue>;
    omitted: string[];
    capabilities: Record<string, string>;
    seed: number;
    error: string;
    timestamp: string;
}

/**
 * @file Execution Type Definitions
 *
 * @module dag/execution
 */

import type { OutdatedReason } from '../invalidation/outdated.js';

/**
 * What to do after a target fails.
 * - `continue`: keep running every branch that does not depend on it
 * - `stop`: start nothing new; outdated targets not yet started are recorded `cancelled`
 */
export type ErrorMode = 'continue' | 'stop';

/**
 * @property workers - Targets run concurrently at most (default 1)
 * @property errorMode - Behaviour after a failure (default `continue`)
 * @property workspaceOnError - Capture a workspace for each failed target (default true)
 * @property names - Restrict the run to these targets and their ancestors
 * @property seed - Pipeline seed every target seed derives from (default 0)
 */
export interface RunOptions {
    workers?: number;
    errorMode?: ErrorMode;
    workspaceOnError?: boolean;
    names?: string[];
    seed?: number;
}

/**
 * Outcome of one run, by target name.
 *
 * @property ok - False when any target errored
 * @property completed - Ran and succeeded, in completion order
 * @property skipped - Up to date, not run
 * @property errored - Ran and failed
 * @property upstreamFailed - Not run because a dependency failed
 * @property cancelled - Not run because the run stopped after a failure
 * @property errors - Failure message per errored target
 * @property warnings - Warnings per target that raised any
 * @property reasons - Why each run target was outdated
 */
export interface RunReport {
    ok: boolean;
    completed: string[];
    skipped: string[];
    errored: string[];
    upstreamFailed: string[];
    cancelled: string[];
    errors: Record<string, string>;
    warnings: Record<string, string[]>;
    reasons: Record<string, OutdatedReason[]>;
    seconds: number;
}

/**
 * @file Capability Type Definitions
 *
 * A capability is the engine's stand-in for third-party functionality a
 * command relies on: a named, versioned bundle of functions. Commands
 * call them as `name.fn(...)`. The engine treats the version as an
 * opaque token; bumping it invalidates every target that declares the
 * capability.
 *
 * @module dag/capabilities
 */

/**
 * What a capability function can see of the running target.
 *
 * @property target - Name of the target being evaluated
 * @property seed - The target's seed
 * @property root - Pipeline root directory (file paths resolve against it)
 * @property random - Next number in [0, 1) from the target's seeded stream
 * @property warn - Record a warning against the target
 */
export interface CommandContext {
    target: string;
    seed: number;
    root: string;
    random(): number;
    warn(message: string): void;
}

export type CapabilityFunction = (context: CommandContext, ...args: unknown[]) => unknown;

export interface Capability {
    name: string;
    version: string;
    functions: Record<string, CapabilityFunction>;
}

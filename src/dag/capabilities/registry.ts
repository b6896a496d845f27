/**
 * @file Capability Registry
 *
 * Holds the capabilities available to a pipeline. Resolved once per
 * run; a run never sees a capability change mid-way.
 *
 * @module dag/capabilities
 */

import type { Capability, CapabilityFunction } from './types.js';

/** A dotted callee split into capability and function name. */
export interface CalleeParts {
    capability: string;
    fn: string;
}

export function callee_split(callee: string): CalleeParts | null {
    const dot: number = callee.indexOf('.');
    if (dot <= 0 || dot === callee.length - 1) return null;
    return { capability: callee.slice(0, dot), fn: callee.slice(dot + 1) };
}

export class CapabilityRegistry {
    private readonly capabilities = new Map<string, Capability>();

    constructor(capabilities: Capability[] = []) {
        capabilities.forEach(capability => this.register(capability));
    }

    /** Add or replace a capability. */
    register(capability: Capability): void {
        this.capabilities.set(capability.name, {
            ...capability,
            functions: { ...capability.functions },
        });
    }

    has(name: string): boolean {
        return this.capabilities.has(name);
    }

    get(name: string): Capability | null {
        return this.capabilities.get(name) ?? null;
    }

    names(): string[] {
        return Array.from(this.capabilities.keys()).sort();
    }

    /** Resolve `ns.fn` to a function, or null if either part is unknown. */
    function_resolve(callee: string): CapabilityFunction | null {
        const parts: CalleeParts | null = callee_split(callee);
        if (!parts) return null;
        const capability = this.capabilities.get(parts.capability);
        if (!capability || !Object.prototype.hasOwnProperty.call(capability.functions, parts.fn)) return null;
        return capability.functions[parts.fn];
    }

    /**
     * Versions for a set of declared names. Unknown names map to
     * `'unavailable'` so their later appearance still changes digests.
     */
    versions_resolve(names: string[]): Record<string, string> {
        const versions: Record<string, string> = {};
        for (const name of [...names].sort()) {
            versions[name] = this.capabilities.get(name)?.version ?? 'unavailable';
        }
        return versions;
    }

    /** Frozen copy for one run. */
    snapshot(): CapabilityRegistry {
        return new CapabilityRegistry(Array.from(this.capabilities.values()));
    }
}

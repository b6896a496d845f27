/**
 * @file Pipeline Error Taxonomy
 *
 * Every failure the engine raises or records derives from `CairnError`
 * and carries a stable `code`. Load-time failures are `SpecError`s and
 * abort the load; run-time failures are `TargetError`s (and its
 * `ArtifactError` / `RenderError` variants) recorded per target.
 *
 * @module dag
 */

// ─── Base ───────────────────────────────────────────────────────

export class CairnError extends Error {
    readonly code: string;

    constructor(code: string, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

// ─── Load Time ──────────────────────────────────────────────────

export type SpecErrorKind = 'Cycle' | 'DuplicateName' | 'UnresolvedReference' | 'InvalidSpec';

/**
 * A pipeline specification that cannot be installed. No partial
 * registry survives a SpecError.
 */
export class SpecError extends CairnError {
    readonly kind: SpecErrorKind;
    /** Target names involved (the cycle members, the duplicate, the referrer). */
    readonly targets: string[];

    constructor(kind: SpecErrorKind, message: string, targets: string[] = []) {
        super(`SPEC_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`, message);
        this.kind = kind;
        this.targets = targets;
    }
}

// ─── Run Time ───────────────────────────────────────────────────

/** A target's command raised or signalled failure. */
export class TargetError extends CairnError {
    readonly target: string;

    constructor(target: string, message: string, code: string = 'TARGET_FAILED') {
        super(code, message);
        this.target = target;
    }
}

/** A file target finished but its declared paths are not on disk. */
export class ArtifactError extends TargetError {
    constructor(target: string, message: string) {
        super(target, message, 'TARGET_ARTIFACT');
    }
}

/** A literate document failed to render. */
export class RenderError extends TargetError {
    constructor(target: string, message: string) {
        super(target, message, 'TARGET_RENDER');
    }
}

/** A value has no canonical serialized form. */
export class SerializationError extends CairnError {
    constructor(message: string) {
        super('VALUE_NOT_SERIALIZABLE', message);
    }
}

/**
 * Non-fatal: a workspace snapshot could not serialize one of the
 * bindings. Logged, never thrown out of the scheduler.
 */
export class CaptureWarning extends CairnError {
    readonly target: string;
    readonly binding: string;

    constructor(target: string, binding: string, reason: string) {
        super('CAPTURE_WARNING', `workspace for '${target}' omits '${binding}': ${reason}`);
        this.target = target;
        this.binding = binding;
    }
}

/** Extract a printable message from anything a command may throw. */
export function errorMessage_extract(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return String(error);
}

/** The `code` of a Node system error (`ENOENT`, `EEXIST`, ...), if any. */
export function errorCode_get(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const code: unknown = error.code;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

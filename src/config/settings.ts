/**
 * @file Runtime Settings Service
 *
 * Project-scoped runtime settings with central validation and
 * deterministic precedence (explicit > env > config file > defaults).
 *
 * @module
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';

import { CairnError, errorCode_get } from '../dag/errors.js';
import type { ErrorMode, RunOptions } from '../dag/execution/types.js';
import { issues_format, yaml_parse } from '../dag/graph/parser/common.js';
import { logger_create } from '../logging/logger.js';
import type { LogLevel, Logger } from '../logging/logger.js';

export interface CairnSettings {
    storeDir: string;
    workers: number;
    errorMode: ErrorMode;
    seed: number;
    trustTimestamps: boolean;
    workspaceOnError: boolean;
    logLevel: LogLevel;
}

export type SettingsKey = keyof CairnSettings;

export type SettingSource = 'explicit' | 'env' | 'file' | 'default';

/** Config file looked up in the project root. */
export const SETTINGS_FILE = 'cairn.config.yaml';

export const SETTINGS_KEYS: SettingsKey[] = [
    'storeDir',
    'workers',
    'errorMode',
    'seed',
    'trustTimestamps',
    'workspaceOnError',
    'logLevel',
];

export const SETTINGS_ENV: Record<SettingsKey, string> = {
    storeDir: 'CAIRN_STORE_DIR',
    workers: 'CAIRN_WORKERS',
    errorMode: 'CAIRN_ERROR_MODE',
    seed: 'CAIRN_SEED',
    trustTimestamps: 'CAIRN_TRUST_TIMESTAMPS',
    workspaceOnError: 'CAIRN_WORKSPACE_ON_ERROR',
    logLevel: 'CAIRN_LOG_LEVEL',
};

const DEFAULTS: CairnSettings = {
    storeDir: '_cairn',
    workers: 1,
    errorMode: 'continue',
    seed: 0,
    trustTimestamps: true,
    workspaceOnError: true,
    logLevel: 'info',
};

// Env values and CLI flags arrive as strings.
const FlagSchema = z.union([
    z.boolean(),
    z.enum(['true', 'false', '1', '0']).transform((raw: string) => raw === 'true' || raw === '1'),
]);

type FieldSchemas = { [K in SettingsKey]: z.ZodType<CairnSettings[K], z.ZodTypeDef, unknown> };

const FIELD_SCHEMAS: FieldSchemas = {
    storeDir: z.string().min(1),
    workers: z.coerce.number().int().min(1),
    errorMode: z.enum(['continue', 'stop']),
    seed: z.coerce.number().int(),
    trustTimestamps: FlagSchema,
    workspaceOnError: FlagSchema,
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
};

const SettingsFileSchema = z.object(FIELD_SCHEMAS).partial().strict();

export type SettingResult<K extends SettingsKey> =
    | { ok: true; value: CairnSettings[K] }
    | { ok: false; error: string };

/** Validate one raw setting value. */
export function setting_parse<K extends SettingsKey>(key: K, raw: unknown): SettingResult<K> {
    const result = FIELD_SCHEMAS[key].safeParse(raw);
    if (!result.success) {
        return { ok: false, error: `Invalid value for ${key}: ${String(raw)}` };
    }
    return { ok: true, value: result.data };
}

function layer_assign<K extends SettingsKey>(layer: Partial<CairnSettings>, key: K, value: CairnSettings[K]): void {
    layer[key] = value;
}

export interface SettingsLayers {
    explicit?: Partial<CairnSettings>;
    env?: Record<string, string | undefined>;
    file?: Partial<CairnSettings>;
}

export class SettingsService {
    private readonly explicit: Partial<CairnSettings> = {};
    private readonly fromEnv: Partial<CairnSettings> = {};
    private readonly fromFile: Partial<CairnSettings>;
    private readonly log: Logger = logger_create({ component: 'settings' });

    constructor(layers: SettingsLayers = {}) {
        this.fromFile = { ...layers.file };
        Object.assign(this.explicit, layers.explicit);
        const env: Record<string, string | undefined> = layers.env ?? {};
        for (const key of SETTINGS_KEYS) {
            const raw: string | undefined = env[SETTINGS_ENV[key]];
            if (raw === undefined || raw === '') continue;
            this.env_apply(key, raw);
        }
    }

    /**
     * Build settings for a project root: reads `cairn.config.yaml` there
     * when present and the `CAIRN_*` variables of `env`.
     *
     * @throws CairnError (SETTINGS_INVALID) when the config file is malformed
     */
    public static async load(
        root: string,
        explicit: Partial<CairnSettings> = {},
        env: Record<string, string | undefined> = process.env,
    ): Promise<SettingsService> {
        const file: Partial<CairnSettings> = await settingsFile_read(join(root, SETTINGS_FILE));
        return new SettingsService({ explicit, env, file });
    }

    /** Effective value of every setting. */
    public snapshot(): CairnSettings {
        return {
            storeDir: this.get('storeDir'),
            workers: this.get('workers'),
            errorMode: this.get('errorMode'),
            seed: this.get('seed'),
            trustTimestamps: this.get('trustTimestamps'),
            workspaceOnError: this.get('workspaceOnError'),
            logLevel: this.get('logLevel'),
        };
    }

    public get<K extends SettingsKey>(key: K): CairnSettings[K] {
        return this.explicit[key] ?? this.fromEnv[key] ?? this.fromFile[key] ?? DEFAULTS[key];
    }

    /** Which layer the effective value of `key` comes from. */
    public source(key: SettingsKey): SettingSource {
        if (this.explicit[key] !== undefined) return 'explicit';
        if (this.fromEnv[key] !== undefined) return 'env';
        if (this.fromFile[key] !== undefined) return 'file';
        return 'default';
    }

    /** Set one explicit override with validation. */
    public set<K extends SettingsKey>(key: K, raw: unknown): SettingResult<K> {
        const result: SettingResult<K> = setting_parse(key, raw);
        if (result.ok) layer_assign(this.explicit, key, result.value);
        return result;
    }

    public unset(key: SettingsKey): void {
        delete this.explicit[key];
    }

    /** Defaults for `Pipeline.run()`. */
    public runOptions(): RunOptions {
        return {
            workers: this.get('workers'),
            errorMode: this.get('errorMode'),
            seed: this.get('seed'),
            workspaceOnError: this.get('workspaceOnError'),
        };
    }

    private env_apply<K extends SettingsKey>(key: K, raw: string): void {
        const result: SettingResult<K> = setting_parse(key, raw);
        if (result.ok) {
            layer_assign(this.fromEnv, key, result.value);
            return;
        }
        this.log.warn('Ignoring invalid environment setting', { variable: SETTINGS_ENV[key], value: raw });
    }
}

/**
 * Read and validate a settings file. A missing file is an empty layer.
 *
 * @throws CairnError (SETTINGS_INVALID) on YAML or schema violations
 */
export async function settingsFile_read(file: string): Promise<Partial<CairnSettings>> {
    let text: string;
    try {
        text = await readFile(file, 'utf-8');
    } catch (error: unknown) {
        if (errorCode_get(error) === 'ENOENT') return {};
        throw error;
    }

    let raw: unknown;
    try {
        raw = yaml_parse(text);
    } catch (error: unknown) {
        const reason: string = error instanceof Error ? error.message : String(error);
        throw new CairnError('SETTINGS_INVALID', `Invalid settings YAML in ${file}: ${reason}`);
    }
    if (raw === undefined || raw === null) return {};

    const result = SettingsFileSchema.safeParse(raw);
    if (!result.success) {
        throw new CairnError('SETTINGS_INVALID', `Invalid settings in ${file}: ${issues_format(result.error)}`);
    }
    return result.data;
}

import * as fs from 'fs/promises';
import * as path from 'path';
import type { InlineFinalization, ToolCallMode } from '../core/types.js';
import type { ModelProvider } from '../services/model-client.js';

export interface AppConfig {
    host: {
        /** Command that starts the tool host; empty means this program in `serve` mode. */
        command: string;
        args: string[];
        env: Record<string, string>;
    };
    model: {
        provider: ModelProvider;
        baseUrl: string;
        model: string;
        apiKey: string;
        timeoutMs: number;
    };
    orchestration: {
        toolCallMode: ToolCallMode;
        maxToolRounds: number;
        historyWindow: number;
        maxHistoryEntries: number;
        inlineFinalization: InlineFinalization;
    };
    telegram: {
        botToken: string;
        /** Telegram user ids allowed to talk to the bot; empty allows everyone. */
        allowFrom: number[];
    };
    logging: {
        dir: string;
        enabled: boolean;
    };
}

export const CONFIG_FILE_NAME = 'toolbridge.json';

export const DEFAULT_CONFIG: AppConfig = {
    host: {
        command: '',
        args: [],
        env: {},
    },
    model: {
        provider: 'ollama',
        baseUrl: 'http://localhost:11434',
        model: 'llama3.2:3b-instruct-q5_K_M',
        apiKey: '',
        timeoutMs: 30_000,
    },
    orchestration: {
        toolCallMode: 'structured',
        maxToolRounds: 1,
        historyWindow: 6,
        maxHistoryEntries: 20,
        inlineFinalization: 'substitute',
    },
    telegram: {
        botToken: '',
        allowFrom: [],
    },
    logging: {
        dir: 'logs',
        enabled: true,
    },
};

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asSection(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}

function stringOr(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

function positiveIntOr(value: unknown, fallback: number): number {
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    return typeof parsed === 'number' && Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function nonNegativeIntOr(value: unknown, fallback: number): number {
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    return typeof parsed === 'number' && Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback;
}

function stringListOr(value: unknown, fallback: string[]): string[] {
    return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [...fallback];
}

function stringMapOr(value: unknown, fallback: Record<string, string>): Record<string, string> {
    if (!isRecord(value)) return { ...fallback };
    const result: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
        if (typeof entry === 'string') result[key] = entry;
    }
    return result;
}

export function parseToolCallMode(value: unknown): ToolCallMode | null {
    return value === 'structured' || value === 'inline' ? value : null;
}

function parseProvider(value: unknown): ModelProvider | null {
    return value === 'ollama' || value === 'openai-compatible' ? value : null;
}

function parseFinalization(value: unknown): InlineFinalization | null {
    return value === 'substitute' || value === 'follow-up' ? value : null;
}

/** Overlay a loaded document on the defaults, field by field; invalid values keep the default. */
export function mergeWithDefaults(loaded: unknown): AppConfig {
    const root = asSection(loaded);
    const host = asSection(root.host);
    const model = asSection(root.model);
    const orchestration = asSection(root.orchestration);
    const telegram = asSection(root.telegram);
    const logging = asSection(root.logging);
    const defaults = DEFAULT_CONFIG;

    return {
        host: {
            command: stringOr(host.command, defaults.host.command),
            args: stringListOr(host.args, defaults.host.args),
            env: stringMapOr(host.env, defaults.host.env),
        },
        model: {
            provider: parseProvider(model.provider) ?? defaults.model.provider,
            baseUrl: stringOr(model.baseUrl, defaults.model.baseUrl),
            model: stringOr(model.model, defaults.model.model),
            apiKey: stringOr(model.apiKey, defaults.model.apiKey),
            timeoutMs: positiveIntOr(model.timeoutMs, defaults.model.timeoutMs),
        },
        orchestration: {
            toolCallMode: parseToolCallMode(orchestration.toolCallMode) ?? defaults.orchestration.toolCallMode,
            maxToolRounds: nonNegativeIntOr(orchestration.maxToolRounds, defaults.orchestration.maxToolRounds),
            historyWindow: nonNegativeIntOr(orchestration.historyWindow, defaults.orchestration.historyWindow),
            maxHistoryEntries: positiveIntOr(orchestration.maxHistoryEntries, defaults.orchestration.maxHistoryEntries),
            inlineFinalization:
                parseFinalization(orchestration.inlineFinalization) ?? defaults.orchestration.inlineFinalization,
        },
        telegram: {
            botToken: stringOr(telegram.botToken, defaults.telegram.botToken),
            allowFrom: Array.isArray(telegram.allowFrom)
                ? telegram.allowFrom.filter((id): id is number => typeof id === 'number' && Number.isInteger(id))
                : [...defaults.telegram.allowFrom],
        },
        logging: {
            dir: stringOr(logging.dir, defaults.logging.dir),
            enabled: booleanOr(logging.enabled, defaults.logging.enabled),
        },
    };
}

/** Environment variables win over the file. Unset or empty variables change nothing. */
export function applyEnvOverrides(config: AppConfig, env: Env = process.env): AppConfig {
    const pick = (name: string): string | undefined => {
        const value = env[name]?.trim();
        return value ? value : undefined;
    };

    const next: AppConfig = {
        host: { ...config.host, args: [...config.host.args], env: { ...config.host.env } },
        model: { ...config.model },
        orchestration: { ...config.orchestration },
        telegram: { ...config.telegram, allowFrom: [...config.telegram.allowFrom] },
        logging: { ...config.logging },
    };

    next.model.baseUrl = pick('OLLAMA_BASE_URL') ?? next.model.baseUrl;
    next.model.model = pick('MODEL_NAME') ?? next.model.model;
    next.model.provider = parseProvider(pick('MODEL_PROVIDER')) ?? next.model.provider;
    next.model.apiKey = pick('MODEL_API_KEY') ?? next.model.apiKey;
    next.model.timeoutMs = positiveIntOr(pick('MODEL_TIMEOUT_MS'), next.model.timeoutMs);
    next.orchestration.toolCallMode = parseToolCallMode(pick('TOOL_CALL_MODE')) ?? next.orchestration.toolCallMode;
    next.telegram.botToken = pick('TELEGRAM_BOT_TOKEN') ?? next.telegram.botToken;
    next.logging.dir = pick('TOOLBRIDGE_LOG_DIR') ?? next.logging.dir;
    return next;
}

export function getConfigPath(overridePath?: string, env: Env = process.env): string {
    if (overridePath) return path.resolve(overridePath);
    const fromEnv = env.TOOLBRIDGE_CONFIG_PATH?.trim();
    if (fromEnv) return path.resolve(fromEnv);
    return path.resolve(CONFIG_FILE_NAME);
}

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/** Read the config file (a missing file means defaults), then apply env overrides. */
export async function readConfig(overridePath?: string, env: Env = process.env): Promise<AppConfig> {
    const targetPath = getConfigPath(overridePath, env);
    let loaded: unknown = {};
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        loaded = JSON.parse(rawData);
    } catch (error) {
        if (errorCode(error) !== 'ENOENT') {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to parse config file at ${targetPath}: ${message}`, { cause: error });
        }
    }
    return applyEnvOverrides(mergeWithDefaults(loaded), env);
}

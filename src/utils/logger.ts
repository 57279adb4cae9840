import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const SENSITIVE_ENV_PATTERN = /(_API_KEY|_TOKEN|_SECRET|_PASSWORD)$/;
const MIN_SECRET_LENGTH = 6;

// key=value / key: value pairs whose key looks like a credential
const INLINE_SECRET_PATTERN =
    /\b([A-Za-z_]*(?:api[_-]?key|token|secret|password|authorization)[A-Za-z_]*)(["']?\s*[=:]\s*)("[^"]*"|'[^']*'|[^\s,;]+)/gi;
const BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9._~+/=-]+/g;

export interface LoggerOptions {
    /** Directory that receives the daily `YYYY-MM-DD.md` journal. */
    dir: string;
    enabled: boolean;
}

let loggerOptions: LoggerOptions = {
    dir: path.resolve('logs'),
    enabled: false,
};
let writeFailureReported = false;

/** Point the journal at a directory. File logging stays off until this is called. */
export function configureLogger(options: Partial<LoggerOptions>): void {
    loggerOptions = { ...loggerOptions, ...options };
    writeFailureReported = false;
}

export function getLoggerOptions(): LoggerOptions {
    return { ...loggerOptions };
}

function collectSecretValues(): string[] {
    const values: string[] = [];
    for (const [key, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_SECRET_LENGTH) continue;
        if (SENSITIVE_ENV_PATTERN.test(key)) {
            values.push(value);
        }
    }
    // Longest first so a secret containing another is replaced whole.
    return values.sort((a, b) => b.length - a.length);
}

/** Redact credential-looking values from text headed for logs or users. */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const secret of collectSecretValues()) {
        scrubbed = scrubbed.split(secret).join(REDACTED);
    }
    scrubbed = scrubbed.replace(BEARER_PATTERN, `Bearer ${REDACTED}`);
    scrubbed = scrubbed.replace(INLINE_SECRET_PATTERN, (_match, key: string, separator: string) => `${key}${separator}${REDACTED}`);
    return scrubbed;
}

function journalPath(now: Date): string {
    const day = now.toISOString().slice(0, 10);
    return path.join(loggerOptions.dir, `${day}.md`);
}

async function appendJournal(entry: string): Promise<void> {
    if (!loggerOptions.enabled) return;

    const now = new Date();
    const line = `- ${now.toISOString()} ${scrubSensitiveText(entry).replace(/\r?\n/g, ' ')}\n`;
    try {
        await mkdir(loggerOptions.dir, { recursive: true });
        await appendFile(journalPath(now), line, 'utf8');
    } catch (err) {
        if (!writeFailureReported) {
            writeFailureReported = true;
            const message = err instanceof Error ? err.message : String(err);
            console.warn(`[Logger] Could not write journal in ${loggerOptions.dir}: ${message}`);
        }
    }
}

/** Record an internal decision or lifecycle event in the journal. */
export async function logThought(thought: string): Promise<void> {
    await appendJournal(thought);
}

/** Record one tool execution with its (scrubbed) arguments and output. */
export async function logToolCall(
    toolName: string,
    args: Record<string, unknown>,
    output: string,
): Promise<void> {
    const preview = output.length > 400 ? `${output.slice(0, 400)}…` : output;
    await appendJournal(`[ToolCall] ${toolName} args=${JSON.stringify(args)} output=${preview}`);
}

import type { ConversationMessage, ConversationRole, ToolCallRequest } from '../core/types.js';

export const DEFAULT_MAX_HISTORY_ENTRIES = 20;
export const DEFAULT_HISTORY_WINDOW = 6;

function freezeMessage(message: ConversationMessage): Readonly<ConversationMessage> {
    const copy: ConversationMessage = { role: message.role, content: message.content };
    if (message.toolCalls) {
        copy.toolCalls = message.toolCalls.map((call): ToolCallRequest =>
            Object.freeze({ ...call, arguments: Object.freeze({ ...call.arguments }) }),
        );
        Object.freeze(copy.toolCalls);
    }
    if (message.toolName !== undefined) {
        copy.toolName = message.toolName;
    }
    if (message.toolCallId !== undefined) {
        copy.toolCallId = message.toolCallId;
    }
    return Object.freeze(copy);
}

/**
 * Append-only message log for one session. Entries are frozen when added; the
 * only way to remove them is `clear()` or the size cap dropping the oldest.
 */
export class ConversationHistory {
    readonly #entries: Readonly<ConversationMessage>[] = [];
    readonly #maxEntries: number;

    constructor(maxEntries = DEFAULT_MAX_HISTORY_ENTRIES) {
        if (!Number.isInteger(maxEntries) || maxEntries < 1) {
            throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}.`);
        }
        this.#maxEntries = maxEntries;
    }

    get size(): number {
        return this.#entries.length;
    }

    append(role: ConversationRole, content: string, extras: Pick<ConversationMessage, 'toolCalls' | 'toolName' | 'toolCallId'> = {}): Readonly<ConversationMessage> {
        const entry = freezeMessage({ role, content, ...extras });
        this.#entries.push(entry);
        if (this.#entries.length > this.#maxEntries) {
            this.#entries.splice(0, this.#entries.length - this.#maxEntries);
        }
        return entry;
    }

    /** The last `n` entries, oldest first. */
    recent(n: number): Readonly<ConversationMessage>[] {
        if (n <= 0) return [];
        return this.#entries.slice(-n);
    }

    all(): Readonly<ConversationMessage>[] {
        return [...this.#entries];
    }

    clear(): void {
        this.#entries.length = 0;
    }
}

/** Session id (`cli:local`, `telegram:<userId>`) → history. */
export class ConversationStore {
    readonly #sessions: Map<string, ConversationHistory> = new Map();
    readonly #maxEntries: number;

    constructor(maxEntries = DEFAULT_MAX_HISTORY_ENTRIES) {
        this.#maxEntries = maxEntries;
    }

    get(sessionId: string): ConversationHistory {
        let history = this.#sessions.get(sessionId);
        if (!history) {
            history = new ConversationHistory(this.#maxEntries);
            this.#sessions.set(sessionId, history);
        }
        return history;
    }

    has(sessionId: string): boolean {
        return this.#sessions.has(sessionId);
    }

    clear(sessionId: string): void {
        this.#sessions.get(sessionId)?.clear();
    }

    sessionIds(): string[] {
        return [...this.#sessions.keys()];
    }
}

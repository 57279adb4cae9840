import type { ToolDescriptor } from '../core/types.js';
import { DuplicateToolError, UnknownToolError } from '../core/errors.js';
import type { ToolDefinition } from '../skills/types.js';
import { logThought } from '../utils/logger.js';

/**
 * Static catalog of the operations the tool host exposes.
 *
 * Registration happens once at startup; lookups afterwards are read-only.
 * `list()` preserves registration order, which is the order the model sees.
 *
 * Usage:
 * ```ts
 * const registry = new ToolRegistry();
 * registry.registerMany(createCorporateTools());
 * const echo = registry.get('echo');
 * ```
 */
export class ToolRegistry {
    readonly #tools: Map<string, ToolDefinition> = new Map();

    /** Register a single tool. Throws `DuplicateToolError` if the name is taken. */
    register(tool: ToolDefinition): void {
        if (this.#tools.has(tool.name)) {
            throw new DuplicateToolError(tool.name);
        }

        this.#tools.set(tool.name, Object.freeze({ ...tool }));
        void logThought(`[ToolRegistry] Registered tool '${tool.name}'.`);
    }

    /** Register multiple tools at once, stopping at the first duplicate. */
    registerMany(tools: ToolDefinition[]): void {
        for (const tool of tools) {
            this.register(tool);
        }
    }

    /** Look up a tool by name. Throws `UnknownToolError` when absent. */
    get(name: string): ToolDefinition {
        const tool = this.#tools.get(name);
        if (!tool) {
            throw new UnknownToolError(name);
        }
        return tool;
    }

    find(name: string): ToolDefinition | undefined {
        return this.#tools.get(name);
    }

    has(name: string): boolean {
        return this.#tools.has(name);
    }

    /** All registered tools in registration order. */
    list(): ToolDefinition[] {
        return [...this.#tools.values()];
    }

    /** Descriptors without handlers, as sent over the wire and shown to the model. */
    describe(): ToolDescriptor[] {
        return this.list().map(({ name, description, parameters }) => ({ name, description, parameters }));
    }

    get size(): number {
        return this.#tools.size;
    }
}

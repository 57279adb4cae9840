import type { ToolCallRequest, ToolResult } from './types.js';
import { describeError, isTurnFatal } from './errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

/** Anything that can run a tool by name: the protocol client, or a host in-process. */
export interface ToolInvoker {
    callTool(name: string, args: Record<string, unknown>): Promise<ToolResult>;
}

export interface ToolOutcome {
    call: ToolCallRequest;
    isError: boolean;
    /** Text handed back to the model: the result, or `Error executing <name>: <reason>`. */
    text: string;
}

export function resultText(result: ToolResult): string {
    return result.content.map((block) => block.text).join('\n');
}

export function toolErrorText(toolName: string, reason: string): string {
    return `Error executing ${toolName}: ${reason}`;
}

/**
 * Runs one batch of tool calls serially, in the order the model gave them.
 * A failing call becomes error text and the batch carries on; only a broken
 * transport (or endpoint) aborts, because every later call would fail the same way.
 */
export class LaneExecutor {
    readonly #invoker: ToolInvoker;

    constructor(invoker: ToolInvoker) {
        this.#invoker = invoker;
    }

    async executeToolCalls(calls: readonly ToolCallRequest[]): Promise<ToolOutcome[]> {
        const outcomes: ToolOutcome[] = [];

        // Lane-based execution: one call at a time in an await loop
        for (const call of calls) {
            outcomes.push(await this.#execute(call));
        }
        return outcomes;
    }

    async #execute(call: ToolCallRequest): Promise<ToolOutcome> {
        try {
            const result = await this.#invoker.callTool(call.toolName, call.arguments);
            const text = resultText(result);
            if (result.isError) {
                console.warn(`[LaneExecutor] Tool '${call.toolName}' returned an error: ${scrubSensitiveText(text)}`);
                return { call, isError: true, text: toolErrorText(call.toolName, text) };
            }
            return { call, isError: false, text };
        } catch (err) {
            if (isTurnFatal(err)) {
                throw err;
            }
            const reason = describeError(err);
            await logThought(`[LaneExecutor] Tool '${call.toolName}' failed: ${scrubSensitiveText(reason)}`);
            return { call, isError: true, text: toolErrorText(call.toolName, reason) };
        }
    }
}

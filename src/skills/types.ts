import type { ToolDescriptor } from '../core/types.js';
import type { CalendarStore } from '../services/calendar-store.js';
import type { CorporateData } from '../services/corporate-data.js';

/** Shared state handed to every tool handler by the host. */
export interface ToolContext {
  calendar: CalendarStore;
  data: CorporateData;
  /** Snapshot of the registry, in registration order. */
  listTools(): ToolDescriptor[];
}

/**
 * A handler returns text or a JSON-serializable value; throwing (ideally a
 * `ToolExecutionFault`) marks the call as failed without affecting the host.
 */
export type ToolHandler = (
  args: Record<string, unknown>,
  context: ToolContext,
) => unknown | Promise<unknown>;

export interface ToolDefinition extends ToolDescriptor {
  handler: ToolHandler;
}

import { ToolExecutionFault } from '../core/errors.js';
import { searchRegulations } from '../services/regulations.js';
import type { ToolDefinition } from './types.js';

function requireString(args: Record<string, unknown>, name: string): string {
  const value = args[name];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ToolExecutionFault(`'${name}' must be a non-empty string.`);
  }
  return value.trim();
}

// Models often send numbers as strings.
function optionalMinutes(args: Record<string, unknown>, name: string, fallback: number): number {
  const value = args[name];
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new ToolExecutionFault(`'${name}' must be a number of minutes.`);
  }
  return parsed;
}

function buildListToolsTool(): ToolDefinition {
  return {
    name: 'list_tools',
    description: 'Show every available tool with its description.',
    parameters: { type: 'object', properties: {}, required: [] },
    handler(_args, context) {
      const tools = context.listTools().map((tool) => ({
        name: tool.name,
        description: tool.description,
        parameters: Object.keys(tool.parameters.properties ?? {}),
      }));
      return {
        available_tools: tools,
        total_count: tools.length,
        description: 'Complete list of the tools this host exposes',
      };
    },
  };
}

function buildAvailableSlotsTool(): ToolDefinition {
  return {
    name: 'get_available_slots',
    description: 'Get the free time slots for meetings this week.',
    parameters: { type: 'object', properties: {}, required: [] },
    handler(_args, context) {
      return {
        available_slots: context.calendar.listAvailable(),
        note: context.data.timezoneNote,
        booking_instruction: "Use the 'schedule_meeting' tool to book a slot",
      };
    },
  };
}

function buildScheduleMeetingTool(): ToolDefinition {
  return {
    name: 'schedule_meeting',
    description: 'Schedule a meeting at a given date and time.',
    parameters: {
      type: 'object',
      properties: {
        date: { type: 'string', description: 'Meeting date, YYYY-MM-DD' },
        time: { type: 'string', description: 'Start time, HH:MM' },
        title: { type: 'string', description: 'Meeting title' },
        duration: { type: 'integer', description: 'Length in minutes', default: 60 },
      },
      required: ['date', 'time', 'title'],
    },
    async handler(args, context) {
      const date = requireString(args, 'date');
      const time = requireString(args, 'time');
      const title = requireString(args, 'title');
      const duration = optionalMinutes(args, 'duration', 60);
      return context.calendar.book(date, time, title, duration);
    },
  };
}

function buildDevelopmentPlanTool(): ToolDefinition {
  return {
    name: 'get_development_plan',
    description: 'Get the individual development plan.',
    parameters: { type: 'object', properties: {}, required: [] },
    handler(_args, context) {
      return context.data.developmentPlan;
    },
  };
}

function buildSearchRegulationsTool(): ToolDefinition {
  return {
    name: 'search_regulations',
    description: 'Search the corporate regulations and policies.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query, e.g. "vacation" or "dress code"' },
      },
      required: ['query'],
    },
    handler(args, context) {
      const query = typeof args.query === 'string' ? args.query : '';
      if (query.trim().length === 0) {
        throw new ToolExecutionFault('A search query is required.');
      }

      const results = searchRegulations(query, context.data.regulations, context.data.synonyms);
      if (results.length === 0) {
        return {
          message: 'Nothing matched your query',
          suggestion: `Try keywords such as: ${context.data.searchSuggestions.join(', ')}`,
        };
      }
      return { search_query: query, results, found_count: results.length };
    },
  };
}

/** The corporate tool set, in the order the model sees it. */
export function createCorporateTools(): ToolDefinition[] {
  return [
    buildListToolsTool(),
    buildAvailableSlotsTool(),
    buildScheduleMeetingTool(),
    buildDevelopmentPlanTool(),
    buildSearchRegulationsTool(),
  ];
}

import type { GetPromptResult, PromptDescriptor, ResourceDescriptor } from '../types/protocol.js';
import type { ToolContext } from './types.js';

export interface ResourceDefinition extends ResourceDescriptor {
  read(context: ToolContext): unknown;
}

export interface PromptDefinition extends PromptDescriptor {
  description: string;
  render(args: Record<string, string>): GetPromptResult;
}

export function createCorporateResources(): ResourceDefinition[] {
  return [
    {
      uri: 'company://calendar/slots',
      name: 'Available time slots',
      description: 'Free meeting slots for the week',
      mimeType: 'application/json',
      read: (context) => context.calendar.snapshot(),
    },
    {
      uri: 'company://development/plan',
      name: 'Development plan',
      description: 'Individual development plan',
      mimeType: 'application/json',
      read: (context) => context.data.developmentPlan,
    },
    {
      uri: 'company://regulations/all',
      name: 'Corporate regulations',
      description: 'Every corporate regulation and policy',
      mimeType: 'application/json',
      read: (context) => ({ regulations: context.data.regulations }),
    },
  ];
}

function requireArgument(args: Record<string, string>, name: string, prompt: string): string {
  const value = args[name];
  if (value === undefined || value.trim().length === 0) {
    throw new Error(`Prompt '${prompt}' requires the argument '${name}'.`);
  }
  return value.trim();
}

export function createCorporatePrompts(): PromptDefinition[] {
  return [
    {
      name: 'career_advice',
      description: 'Get career development advice',
      arguments: [
        { name: 'current_role', description: 'Current position', required: true },
        { name: 'goal', description: 'Career goal', required: true },
      ],
      render(args) {
        const role = requireArgument(args, 'current_role', 'career_advice');
        const goal = requireArgument(args, 'goal', 'career_advice');
        return {
          description: 'Get career development advice',
          messages: [
            {
              role: 'system',
              content: `You are a career coach. Help an employee working as '${role}' reach the goal '${goal}'.`,
            },
            {
              role: 'user',
              content: [
                `I work as ${role} and want to ${goal}. What steps should I take?`,
                '',
                'Give concrete recommendations on:',
                '- Technical skills to develop',
                '- Practical projects',
                '- Learning resources',
                '- Time frames',
              ].join('\n'),
            },
          ],
        };
      },
    },
    {
      name: 'meeting_agenda',
      description: 'Draft an agenda for a meeting',
      arguments: [
        { name: 'meeting_type', description: 'Kind of meeting', required: true },
        { name: 'participants', description: 'Participants (optional)', required: false },
      ],
      render(args) {
        const meetingType = requireArgument(args, 'meeting_type', 'meeting_agenda');
        const participants = args.participants?.trim() || 'the team';
        return {
          description: 'Draft an agenda for a meeting',
          messages: [
            {
              role: 'user',
              content: [
                `Draft a detailed agenda for a '${meetingType}' meeting with: ${participants}.`,
                '',
                'Include:',
                '- The goal of the meeting',
                '- Main discussion points',
                '- Time boxes for each topic',
                '- Expected outcomes',
                '- Action items and owners',
              ].join('\n'),
            },
          ],
        };
      },
    },
  ];
}

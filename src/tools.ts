/**
 * Tool catalogue. Each tool's arguments are described once, as a zod schema;
 * the JSON schema advertised through `tools/list` is generated from it.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { CONDITION_OPERATORS } from './filters/types.js';
import { SQUAD_STATUS_TOKENS } from './operations/tickets.js';

const Scalar = z.union([z.string(), z.number()]);

export const ConditionArg = z.object({
  condition: z.string().describe('Field name, e.g. "status", "responder_id", "cf_request_for", "team_member"'),
  operator: z.string().describe(`Comparison operator: ${CONDITION_OPERATORS.join(', ')}`),
  type: z.string().optional().describe('"default" for built-in fields, "custom_field" for custom fields (default: "default")'),
  value: z.union([Scalar, z.array(Scalar)]).describe('Value or list of values to match'),
});

export const FilterTicketsArgs = z
  .object({
    query_hash: z
      .array(ConditionArg)
      .optional()
      .describe('Filter conditions in native Freshdesk query_hash format'),
    assignee_name: z
      .string()
      .optional()
      .describe('Agent name or email; resolved to a responder_id condition'),
    status: z.number().int().optional().describe('Status code: 2=Open, 3=Pending, 4=Resolved, 5=Closed'),
    priority: z.number().int().optional().describe('Priority: 1=Low, 2=Medium, 3=High, 4=Urgent'),
    page: z.number().int().optional().describe('Page number (default: 1)'),
    per_page: z.number().int().optional().describe('Results per page (default: 100, max: 100)'),
    order_by: z.string().optional().describe('Field to sort by (default: "created_at")'),
    order_type: z.enum(['asc', 'desc']).optional().describe('Sort direction (default: "desc")'),
    exclude: z.string().optional().describe('Fields to exclude (default: "custom_fields")'),
    include: z.string().optional().describe('Fields to include (default: "requester,stats,company,survey")'),
  })
  .strict();

export const UnresolvedTicketsArgs = z
  .object({
    assignee_name: z.string().optional().describe('Agent name or email'),
    assignee_id: z.number().int().optional().describe('Agent id'),
    status: z
      .array(z.number().int())
      .optional()
      .describe('Status codes to include (default: [2, 3], open and pending)'),
  })
  .strict();

export const SquadTicketsArgs = z
  .object({
    squad: z.string().describe('Squad name, e.g. "Dracarys"'),
    status: z
      .string()
      .optional()
      .describe(`Status bucket: ${SQUAD_STATUS_TOKENS.join(', ')} (default: "unresolved")`),
  })
  .strict();

export const TicketIdArgs = z
  .object({
    ticket_id: z.number().int().describe('Ticket id'),
  })
  .strict();

export const ListTicketsArgs = z
  .object({
    page: z.number().int().optional().describe('Page number (default: 1)'),
    per_page: z.number().int().optional().describe('Results per page (default: 30, max: 100)'),
  })
  .strict();

export const SearchTicketsArgs = z
  .object({
    query: z.string().optional().describe('Freshdesk search query, e.g. "priority:3 AND status:2"'),
    ticket_id: z.number().int().optional().describe("Search with this ticket's subject instead"),
  })
  .strict();

export const SearchAgentsArgs = z
  .object({
    query: z.string().describe('Start of an agent name or email'),
  })
  .strict();

export const NoArgs = z.object({}).strict();

export const TOOLS = [
  {
    name: 'filter_tickets',
    description:
      'Filter tickets with a native query_hash and/or helper parameters (assignee_name, status, priority). ' +
      'Helper parameters override query_hash conditions on the same field.',
    schema: FilterTicketsArgs,
  },
  {
    name: 'get_unresolved_tickets',
    description:
      'Open and pending tickets assigned to an agent. Without assignee_name or assignee_id, ' +
      'returns the tickets of the authenticated agent ("my tickets").',
    schema: UnresolvedTicketsArgs,
  },
  {
    name: 'get_current_agent_id',
    description: 'Get the id of the authenticated agent',
    schema: NoArgs,
  },
  {
    name: 'get_unresolved_tickets_by_squad',
    description: 'Tickets of a squad (team) in a status bucket, unresolved by default',
    schema: SquadTicketsArgs,
  },
  {
    name: 'get_ticket',
    description: 'Get a ticket by id',
    schema: TicketIdArgs,
  },
  {
    name: 'get_tickets',
    description: 'List tickets without filters, one page at a time',
    schema: ListTicketsArgs,
  },
  {
    name: 'search_tickets',
    description: 'Full-text ticket search by query, or by the subject of a given ticket',
    schema: SearchTicketsArgs,
  },
  {
    name: 'find_similar_tickets',
    description: 'Tickets similar to the given one, with AI summaries and resolution details',
    schema: TicketIdArgs,
  },
  {
    name: 'search_agents',
    description: 'Autocomplete agents by name or email',
    schema: SearchAgentsArgs,
  },
] as const;

export type ToolName = (typeof TOOLS)[number]['name'];

function toInputSchema(schema: z.ZodTypeAny): Tool['inputSchema'] {
  const json = zodToJsonSchema(schema, { $refStrategy: 'none', target: 'jsonSchema7' });
  return {
    type: 'object',
    properties: 'properties' in json ? json.properties : {},
    ...('required' in json && json.required?.length ? { required: json.required } : {}),
  };
}

export function listToolDefinitions(): Tool[] {
  return TOOLS.map((tool) => ({
    name: tool.name,
    description: tool.description,
    inputSchema: toInputSchema(tool.schema),
  }));
}

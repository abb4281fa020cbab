import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { FreshdeskConfig } from './config.js';
import { ValidationError, describeError } from './errors.js';
import { formatTicket, formatTicketList } from './format.js';
import type { FreshdeskApi, Ticket } from './freshdesk/types.js';
import type { Logger } from './logger.js';
import {
  filterTickets,
  findSimilarTickets,
  getCurrentAgentId,
  getTicket,
  getUnresolvedTickets,
  getUnresolvedTicketsBySquad,
  listTickets,
  searchAgents,
  searchTickets,
} from './operations/tickets.js';
import {
  FilterTicketsArgs,
  ListTicketsArgs,
  NoArgs,
  SearchAgentsArgs,
  SearchTicketsArgs,
  SquadTicketsArgs,
  TOOLS,
  TicketIdArgs,
  UnresolvedTicketsArgs,
  listToolDefinitions,
  type ToolName,
} from './tools.js';

export const SERVER_NAME = 'freshdesk-mcp';
export const SERVER_VERSION = '0.1.0';

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.infer<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`);
    throw new ValidationError(`Invalid arguments: ${issues.join('; ')}`);
  }
  return result.data;
}

function textResult(...texts: string[]): CallToolResult {
  return { content: texts.map((text) => ({ type: 'text' as const, text })) };
}

function errorResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

function json(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export class FreshdeskMCPServer {
  private server: Server;

  constructor(
    private config: Readonly<FreshdeskConfig>,
    private api: FreshdeskApi,
    private logger: Logger,
  ) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      },
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.logger.log('📨 MCP Request: list_tools');
      const tools = listToolDefinitions();
      this.logger.log(`📥 MCP Response: list_tools -> ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      this.logger.log(`📨 MCP Request: call_tool ${name} ${JSON.stringify(args ?? {})}`);

      try {
        const result = await this.callTool(name, args);
        this.logger.log(`✅ Tool completed: ${name}`);
        return result;
      } catch (error) {
        const errorMessage = describeError(error);
        this.logger.log(`❌ Tool error: ${name} -> ${errorMessage}`);
        return errorResult(`Error calling ${name}: ${errorMessage}`);
      }
    });
  }

  private async callTool(name: string, args: unknown): Promise<CallToolResult> {
    const tool = TOOLS.find((t) => t.name === name);
    if (!tool) {
      return errorResult(`Unknown tool: ${name}`);
    }
    return this.dispatch(tool.name, args);
  }

  private async dispatch(name: ToolName, args: unknown): Promise<CallToolResult> {
    const domain = this.config.domain;

    switch (name) {
      case 'filter_tickets': {
        const result = await filterTickets(this.api, parseArgs(FilterTicketsArgs, args));
        return textResult(formatTicketList(result.tickets, 'matching the filters', { domain }), json(result));
      }

      case 'get_unresolved_tickets': {
        const options = parseArgs(UnresolvedTicketsArgs, args);
        const result = await getUnresolvedTickets(this.api, options);
        const who = options.assignee_name ?? (options.assignee_id !== undefined ? `agent ${options.assignee_id}` : 'you');
        return textResult(formatTicketList(result.tickets, `assigned to ${who}`, { domain }), json(result));
      }

      case 'get_current_agent_id': {
        parseArgs(NoArgs, args);
        const me = await getCurrentAgentId(this.api);
        return textResult(`Current agent id: ${me.agent.id}`, json(me));
      }

      case 'get_unresolved_tickets_by_squad': {
        const options = parseArgs(SquadTicketsArgs, args);
        const result = await getUnresolvedTicketsBySquad(this.api, this.config, options);
        const responders = await this.responderNames(result.tickets);
        const bucket = options.status ?? 'unresolved';
        return textResult(
          formatTicketList(result.tickets, `in squad '${options.squad.trim()}' (${bucket})`, { domain, responders }),
          json(result),
        );
      }

      case 'get_ticket': {
        const { ticket_id } = parseArgs(TicketIdArgs, args);
        const ticket = await getTicket(this.api, ticket_id);
        return textResult(formatTicket(ticket, { domain }), json(ticket));
      }

      case 'get_tickets': {
        const result = await listTickets(this.api, parseArgs(ListTicketsArgs, args));
        return textResult(formatTicketList(result.tickets, `on page ${result.pagination.current_page}`, { domain }), json(result));
      }

      case 'search_tickets': {
        const result = await searchTickets(this.api, parseArgs(SearchTicketsArgs, args));
        return textResult(formatTicketList(result.results, 'matching the search', { domain }), json(result));
      }

      case 'find_similar_tickets': {
        const { ticket_id } = parseArgs(TicketIdArgs, args);
        return textResult(json(await findSimilarTickets(this.api, ticket_id)));
      }

      case 'search_agents': {
        const { query } = parseArgs(SearchAgentsArgs, args);
        return textResult(json(await searchAgents(this.api, query)));
      }
    }
  }

  /**
   * Display names of the responders on the given tickets. A name that cannot
   * be fetched is left out and the ticket shows the responder id instead.
   */
  private async responderNames(tickets: readonly Ticket[]): Promise<Map<number, string>> {
    const names = new Map<number, string>();
    const ids = new Set<number>();
    for (const ticket of tickets) {
      if (ticket.responder_id) ids.add(ticket.responder_id);
    }

    for (const id of ids) {
      try {
        const name = await this.api.getAgentName(id);
        if (name) names.set(id, name);
      } catch (error) {
        this.logger.log(`⚠️ Could not resolve responder ${id}: ${describeError(error)}`);
      }
    }
    return names;
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  async run(): Promise<void> {
    this.logger.log('🚀 Starting Freshdesk MCP Server...');
    this.logger.log(`📡 Server version: ${SERVER_VERSION}`);
    this.logger.log(`🔗 Freshdesk domain: ${this.config.domain}`);
    this.logger.log('⚡ Server ready - waiting for client connections...');

    await this.connect(new StdioServerTransport());

    this.logger.log('🔌 Client connected to MCP server');
  }
}

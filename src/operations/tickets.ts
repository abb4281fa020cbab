import type { FreshdeskConfig } from '../config.js';
import { UnknownStatusError, ValidationError } from '../errors.js';
import { buildCondition } from '../filters/conditions.js';
import { composeQuery, upsertCondition } from '../filters/compose.js';
import { resolveAgentId } from '../filters/resolver.js';
import { serializeQuery } from '../filters/serialize.js';
import { findStatusToken, resolveStatusToken, type StatusToken } from '../filters/status.js';
import type { HelperParams, Query, RawCondition } from '../filters/types.js';
import type { CurrentAgent, FreshdeskApi, Ticket, TicketSearchResult } from '../freshdesk/types.js';

export const MAX_PER_PAGE = 100;

export interface FilterTicketsOptions extends HelperParams {
  query_hash?: RawCondition[];
  page?: number;
  per_page?: number;
  order_by?: string;
  order_type?: 'asc' | 'desc';
  exclude?: string;
  include?: string;
}

export interface Pagination {
  current_page: number;
  next_page: number | null;
  prev_page: number | null;
  per_page: number;
}

export interface FilterResult {
  tickets: Ticket[];
  pagination: Pagination;
  filters_applied: Query;
}

function validatePaging(page: number, perPage: number): void {
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError(`page must be an integer greater than or equal to 1, got ${page}`);
  }
  if (!Number.isInteger(perPage) || perPage < 1 || perPage > MAX_PER_PAGE) {
    throw new ValidationError(`per_page must be an integer between 1 and ${MAX_PER_PAGE}, got ${perPage}`);
  }
}

/**
 * Filters tickets with a native `query_hash`, helper parameters, or both.
 * Returns a single page; `pagination.next_page` tells whether more exist.
 */
export async function filterTickets(api: FreshdeskApi, options: FilterTicketsOptions): Promise<FilterResult> {
  const page = options.page ?? 1;
  const perPage = options.per_page ?? MAX_PER_PAGE;
  validatePaging(page, perPage);

  const { query_hash, status, priority, responder_id, assignee_name, custom_fields } = options;
  const query = await composeQuery(
    query_hash,
    { status, priority, responder_id, assignee_name, custom_fields },
    (term) => resolveAgentId(term, api),
  );
  if (query.length === 0) {
    throw new ValidationError('At least one filter condition is required');
  }

  const result = await api.filterTickets({
    page,
    per_page: perPage,
    order_by: options.order_by ?? 'created_at',
    order_type: options.order_type ?? 'desc',
    exclude: options.exclude ?? 'custom_fields',
    include: options.include ?? 'requester,stats,company,survey',
    ...serializeQuery(query),
  });

  return {
    tickets: result.tickets,
    pagination: {
      current_page: page,
      next_page: result.next_page,
      prev_page: result.prev_page,
      per_page: perPage,
    },
    filters_applied: query,
  };
}

export async function getCurrentAgentId(api: FreshdeskApi): Promise<CurrentAgent> {
  return api.getCurrentAgent();
}

export interface UnresolvedTicketsOptions {
  assignee_name?: string;
  assignee_id?: number;
  status?: number[];
}

/** Open and pending tickets of one agent; the calling agent when none is named. */
export async function getUnresolvedTickets(
  api: FreshdeskApi,
  options: UnresolvedTicketsOptions = {},
): Promise<FilterResult> {
  const { assignee_name, assignee_id } = options;
  if (assignee_name !== undefined && assignee_id !== undefined) {
    throw new ValidationError('Pass either assignee_name or assignee_id, not both');
  }

  const status = options.status ?? unresolvedCodes();

  if (assignee_name !== undefined) {
    return filterTickets(api, { assignee_name, status });
  }

  const responderId = assignee_id ?? (await getCurrentAgentId(api)).agent.id;
  return filterTickets(api, { responder_id: responderId, status });
}

function unresolvedCodes(): number[] {
  const target = resolveStatusToken('unresolved');
  return target.kind === 'status_codes' ? target.codes : [];
}

export const SQUAD_STATUS_TOKENS = [
  'unresolved',
  'open',
  'pending',
  'resolved',
  'awaiting_l2_response',
] as const satisfies readonly StatusToken[];

export interface SquadTicketsOptions {
  squad: string;
  status?: string;
}

type SquadConfig = Pick<FreshdeskConfig, 'squadField' | 'squadTeam'>;

/** Builds the query for a squad's tickets in the given status bucket. */
export function buildSquadQuery(config: SquadConfig, squad: string, status = 'unresolved'): Query {
  const name = squad.trim();
  if (!name) {
    throw new ValidationError('squad must not be empty');
  }

  const token = findStatusToken(status);
  if (token === undefined || !SQUAD_STATUS_TOKENS.some((allowed) => allowed === token)) {
    throw new UnknownStatusError(status, SQUAD_STATUS_TOKENS);
  }

  const target = resolveStatusToken(token);
  let query: Query = [
    target.kind === 'status_codes' ? buildCondition('status', target.codes) : target.condition,
  ];
  if (config.squadTeam) {
    query = upsertCondition(query, buildCondition({ customField: 'freshservice_teams' }, config.squadTeam));
  }
  return upsertCondition(query, buildCondition({ customField: config.squadField }, name));
}

export async function getUnresolvedTicketsBySquad(
  api: FreshdeskApi,
  config: SquadConfig,
  options: SquadTicketsOptions,
): Promise<FilterResult> {
  const query = buildSquadQuery(config, options.squad, options.status);
  return filterTickets(api, { query_hash: query });
}

function validateTicketId(id: number): void {
  if (!Number.isInteger(id) || id < 1) {
    throw new ValidationError(`ticket_id must be a positive integer, got ${id}`);
  }
}

export async function getTicket(api: FreshdeskApi, ticketId: number): Promise<Ticket> {
  validateTicketId(ticketId);
  return api.getTicket(ticketId);
}

/** Plain listing without filters, newest first as the provider returns it. */
export async function listTickets(
  api: FreshdeskApi,
  options: { page?: number; per_page?: number } = {},
): Promise<Omit<FilterResult, 'filters_applied'>> {
  const page = options.page ?? 1;
  const perPage = options.per_page ?? 30;
  validatePaging(page, perPage);

  const result = await api.listTickets(page, perPage);
  return {
    tickets: result.tickets,
    pagination: {
      current_page: page,
      next_page: result.next_page,
      prev_page: result.prev_page,
      per_page: perPage,
    },
  };
}

/**
 * Full-text ticket search. With a ticket id, searches for tickets like it by
 * using that ticket's subject as the query.
 */
export async function searchTickets(
  api: FreshdeskApi,
  options: { query?: string; ticket_id?: number },
): Promise<TicketSearchResult> {
  let query = options.query?.trim();
  if (options.ticket_id !== undefined) {
    const ticket = await getTicket(api, options.ticket_id);
    query = ticket.subject?.trim();
    if (!query) {
      throw new ValidationError(`Ticket ${options.ticket_id} has no subject to search with`);
    }
  }
  if (!query) {
    throw new ValidationError('Either query or ticket_id is required');
  }
  return api.searchTickets(query);
}

export async function findSimilarTickets(api: FreshdeskApi, ticketId: number): Promise<unknown> {
  validateTicketId(ticketId);
  return api.findSimilarTickets(ticketId);
}

export async function searchAgents(api: FreshdeskApi, term: string): Promise<unknown> {
  const trimmed = term.trim();
  if (!trimmed) {
    throw new ValidationError('query must not be empty');
  }
  return api.searchAgents(trimmed);
}

import { z } from 'zod';

// Response bodies are validated loosely: only the fields this server reads
// are described, everything else passes through untouched.

export const AgentSchema = z
  .object({
    id: z.number().int(),
    contact: z
      .object({
        name: z.string().nullish(),
        email: z.string().nullish(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type Agent = z.infer<typeof AgentSchema>;

export const AgentListSchema = z.array(AgentSchema);

export const CurrentAgentSchema = z
  .object({
    agent: z.object({ id: z.number().int() }).passthrough(),
  })
  .passthrough();

export type CurrentAgent = z.infer<typeof CurrentAgentSchema>;

export const AgentDetailSchema = z
  .object({
    agent: z
      .object({
        user: z.object({ name: z.string().nullish() }).passthrough().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const TicketSchema = z
  .object({
    id: z.number().int(),
    subject: z.string().nullish(),
    status: z.number().int().nullish(),
    priority: z.number().int().nullish(),
    responder_id: z.number().int().nullish(),
    due_by: z.string().nullish(),
    fr_due_by: z.string().nullish(),
  })
  .passthrough();

export type Ticket = z.infer<typeof TicketSchema>;

/** The filter endpoint answers with a bare array or with `{ tickets: [...] }`. */
export const TicketListSchema = z.union([
  z.array(TicketSchema),
  z.object({ tickets: z.array(TicketSchema) }).passthrough(),
]);

export const TicketSearchSchema = z
  .object({
    results: z.array(TicketSchema),
    total: z.number().int().optional(),
  })
  .passthrough();

export type TicketSearchResult = z.infer<typeof TicketSearchSchema>;

export interface TicketPage {
  tickets: Ticket[];
  next_page: number | null;
  prev_page: number | null;
}

export type QueryParamValue = string | number;

/** The provider calls the tools need. `FreshdeskClient` is the HTTP-backed implementation. */
export interface FreshdeskApi {
  listAgents(): Promise<Agent[]>;
  searchAgents(term: string): Promise<unknown>;
  getAgentName(id: number): Promise<string | undefined>;
  getCurrentAgent(): Promise<CurrentAgent>;
  filterTickets(params: Record<string, QueryParamValue>): Promise<TicketPage>;
  listTickets(page: number, perPage: number): Promise<TicketPage>;
  getTicket(id: number): Promise<Ticket>;
  searchTickets(query: string): Promise<TicketSearchResult>;
  findSimilarTickets(id: number): Promise<unknown>;
}

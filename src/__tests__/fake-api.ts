import { vi } from 'vitest';
import type { Agent, FreshdeskApi, Ticket, TicketPage } from '../freshdesk/types.js';

export function agent(id: number, name: string, email: string): Agent {
  return { id, contact: { name, email } };
}

export const AGENTS: Agent[] = [
  agent(1, 'John Doe', 'john.doe@example.test'),
  agent(2, 'Johnny Appleseed', 'johnny@example.test'),
  agent(3, 'Jane Smith', 'jane@example.test'),
];

export function ticket(id: number, fields: Partial<Ticket> = {}): Ticket {
  return { id, subject: `Ticket ${id}`, status: 2, priority: 1, ...fields };
}

export function ticketPage(tickets: Ticket[], next_page: number | null = null): TicketPage {
  return { tickets, next_page, prev_page: null };
}

function notStubbed(method: string) {
  return () => Promise.reject(new Error(`${method} is not stubbed`));
}

/** A FreshdeskApi whose methods reject unless overridden. */
export function makeApi(overrides: Partial<FreshdeskApi> = {}): FreshdeskApi {
  return {
    listAgents: vi.fn(notStubbed('listAgents')),
    searchAgents: vi.fn(notStubbed('searchAgents')),
    getAgentName: vi.fn(notStubbed('getAgentName')),
    getCurrentAgent: vi.fn(notStubbed('getCurrentAgent')),
    filterTickets: vi.fn(notStubbed('filterTickets')),
    listTickets: vi.fn(notStubbed('listTickets')),
    getTicket: vi.fn(notStubbed('getTicket')),
    searchTickets: vi.fn(notStubbed('searchTickets')),
    findSimilarTickets: vi.fn(notStubbed('findSimilarTickets')),
    ...overrides,
  };
}

import { priorityName, statusName } from './filters/status.js';
import type { Ticket } from './freshdesk/types.js';

export function ticketUrl(domain: string, id: number): string {
  return `https://${domain}/a/tickets/${id}`;
}

export interface FormatOptions {
  domain: string;
  /** responder_id → display name; tickets without an entry show the id. */
  responders?: ReadonlyMap<number, string>;
}

function responderLabel(ticket: Ticket, responders: ReadonlyMap<number, string>): string {
  if (!ticket.responder_id) return 'Unassigned';
  return responders.get(ticket.responder_id) ?? `Agent ID: ${ticket.responder_id}`;
}

export function formatTicket(ticket: Ticket, options: FormatOptions): string {
  let text = `#${ticket.id}: ${ticket.subject || 'No subject'}\n`;
  text += `  Status: ${statusName(ticket.status)}\n`;
  text += `  Priority: ${priorityName(ticket.priority)}\n`;
  if (options.responders) {
    text += `  Responder: ${responderLabel(ticket, options.responders)}\n`;
  }
  if (ticket.fr_due_by) {
    text += `  First response due: ${ticket.fr_due_by}\n`;
  }
  text += `  Resolution due: ${ticket.due_by || 'Not set'}\n`;
  text += `  URL: ${ticketUrl(options.domain, ticket.id)}\n`;
  return text;
}

/** "Found 2 ticket(s) <description>:" followed by one block per ticket. */
export function formatTicketList(tickets: readonly Ticket[], description: string, options: FormatOptions): string {
  let text = `Found ${tickets.length} ticket(s) ${description}`;
  if (tickets.length === 0) {
    return `${text}.`;
  }
  text += ':\n\n';
  text += tickets.map((t) => formatTicket(t, options)).join('\n');
  return text;
}

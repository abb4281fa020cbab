import { describe, expect, it } from 'vitest';
import { formatTicket, formatTicketList, ticketUrl } from '../format.js';
import { ticket } from './fake-api.js';

const domain = 'acme.freshdesk.com';

describe('formatTicket', () => {
  it('renders the ticket block', () => {
    const text = formatTicket(
      ticket(42, { subject: 'Printer jam', status: 3, priority: 4, fr_due_by: '2026-10-19T09:00:00Z' }),
      { domain },
    );

    expect(text).toBe(
      '#42: Printer jam\n' +
        '  Status: Pending\n' +
        '  Priority: Urgent\n' +
        '  First response due: 2026-10-19T09:00:00Z\n' +
        '  Resolution due: Not set\n' +
        '  URL: https://acme.freshdesk.com/a/tickets/42\n',
    );
  });

  it('labels responders when names are given', () => {
    const responders = new Map([[1, 'John Doe']]);

    expect(formatTicket(ticket(1, { responder_id: 1 }), { domain, responders })).toContain('  Responder: John Doe\n');
    expect(formatTicket(ticket(2, { responder_id: 9 }), { domain, responders })).toContain('  Responder: Agent ID: 9\n');
    expect(formatTicket(ticket(3, { responder_id: null }), { domain, responders })).toContain(
      '  Responder: Unassigned\n',
    );
  });

  it('copes with missing and unknown codes', () => {
    const text = formatTicket(ticket(5, { subject: '', status: 7, priority: null }), { domain });

    expect(text.split('\n').slice(0, 3)).toEqual(['#5: No subject', '  Status: Unknown (7)', '  Priority: Unknown']);
  });
});

describe('formatTicketList', () => {
  it('says so when nothing matched', () => {
    expect(formatTicketList([], 'matching the filters', { domain })).toBe('Found 0 ticket(s) matching the filters.');
  });

  it('separates ticket blocks with a blank line', () => {
    const text = formatTicketList([ticket(1), ticket(2)], 'on page 1', { domain });

    expect(text.startsWith('Found 2 ticket(s) on page 1:\n\n#1: Ticket 1\n')).toBe(true);
    expect(text).toContain(`${ticketUrl(domain, 1)}\n\n#2: Ticket 2\n`);
  });
});

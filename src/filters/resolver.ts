import { AmbiguousMatchError, NotFoundError, ValidationError, type AgentCandidate } from '../errors.js';
import type { Agent } from '../freshdesk/types.js';

export type AgentMatch =
  | { kind: 'unique'; agent: Agent }
  | { kind: 'ambiguous'; candidates: Agent[] }
  | { kind: 'none' };

export interface AgentDirectory {
  listAgents(): Promise<Agent[]>;
}

/**
 * Matches a name or email against the agents listing.
 *
 * An exact, case-insensitive hit on name or email wins outright (names and
 * emails are unique within a helpdesk). Otherwise the term is looked for
 * inside display names, and only a single hit counts as a match.
 */
export function matchAgent(term: string, agents: readonly Agent[]): AgentMatch {
  const needle = term.trim().toLowerCase();

  const exact = agents.find(
    (a) => a.contact.name?.toLowerCase() === needle || a.contact.email?.toLowerCase() === needle,
  );
  if (exact) {
    return { kind: 'unique', agent: exact };
  }

  const partial = agents.filter((a) => a.contact.name?.toLowerCase().includes(needle));
  if (partial.length === 1) {
    return { kind: 'unique', agent: partial[0] };
  }
  if (partial.length > 1) {
    return { kind: 'ambiguous', candidates: partial };
  }
  return { kind: 'none' };
}

function toCandidate(agent: Agent): AgentCandidate {
  return {
    id: agent.id,
    name: agent.contact.name ?? undefined,
    email: agent.contact.email ?? undefined,
  };
}

/**
 * Resolves a name, email or numeric id to a responder id. A term made of
 * digits only is taken as the id itself and needs no lookup.
 */
export async function resolveAgentId(term: string, directory: AgentDirectory): Promise<number> {
  const trimmed = term.trim();
  if (!trimmed) {
    throw new ValidationError('assignee_name must not be empty');
  }
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }

  const match = matchAgent(trimmed, await directory.listAgents());
  switch (match.kind) {
    case 'unique':
      return match.agent.id;
    case 'ambiguous':
      throw new AmbiguousMatchError(trimmed, match.candidates.map(toCandidate));
    case 'none':
      throw new NotFoundError(trimmed);
  }
}

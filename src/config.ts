export interface FreshdeskConfig {
  apiKey: string;
  /** Host of the helpdesk, e.g. `acme.freshdesk.com`. */
  domain: string;
  baseUrl: string;
  timeoutMs: number;
  /** Custom field holding the squad a ticket belongs to. */
  squadField: string;
  /** Value of the `freshservice_teams` custom field squads live under; empty disables that condition. */
  squadTeam: string;
}

type Env = Record<string, string | undefined>;

function required(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`Missing required env var: ${key}`);
  }
  return value;
}

function optional(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined ? fallback : value.trim();
}

function optionalInt(env: Env, key: string, fallback: number): number {
  const value = env[key];
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function toHost(domain: string): string {
  return domain.replace(/^https?:\/\//, '').replace(/\/+$/, '');
}

export function loadConfig(env: Env = process.env): Readonly<FreshdeskConfig> {
  const domain = toHost(required(env, 'FRESHDESK_DOMAIN'));

  return Object.freeze({
    apiKey: required(env, 'FRESHDESK_API_KEY'),
    domain,
    baseUrl: `https://${domain}`,
    timeoutMs: optionalInt(env, 'FRESHDESK_TIMEOUT_MS', 30000),
    squadField: optional(env, 'FRESHDESK_SQUAD_FIELD', 'team_member') || 'team_member',
    squadTeam: optional(env, 'FRESHDESK_SQUAD_TEAM', 'L2 Teams'),
  });
}

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { z } from 'zod';
import type { FreshdeskConfig } from '../config.js';
import { UpstreamError } from '../errors.js';
import type { Logger } from '../logger.js';
import { collectPages, parseLinkHeader } from './pagination.js';
import {
  AgentDetailSchema,
  AgentListSchema,
  CurrentAgentSchema,
  TicketListSchema,
  TicketSchema,
  TicketSearchSchema,
  type Agent,
  type CurrentAgent,
  type FreshdeskApi,
  type QueryParamValue,
  type Ticket,
  type TicketPage,
  type TicketSearchResult,
} from './types.js';

const AGENTS_PER_PAGE = 100;

interface RawResponse {
  status: number;
  data: unknown;
  link: string;
}

export interface FreshdeskClientOptions {
  /** Replaces axios' network adapter; tests answer requests in-process with it. */
  adapter?: AxiosAdapter;
}

export class FreshdeskClient implements FreshdeskApi {
  private client: AxiosInstance;

  constructor(
    config: Readonly<FreshdeskConfig>,
    private logger: Logger,
    options: FreshdeskClientOptions = {},
  ) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      auth: { username: config.apiKey, password: 'X' },
      headers: { 'Content-Type': 'application/json' },
      // Status handling happens in request(), so error bodies reach UpstreamError.
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    this.setupLogging();
  }

  private setupLogging(): void {
    this.client.interceptors.request.use(
      (config) => {
        this.logger.log(`🌐 HTTP Request: ${config.method?.toUpperCase()} ${config.url}`);
        if (config.params) {
          this.logger.log(`📤 Request Params: ${JSON.stringify(config.params)}`);
        }
        return config;
      },
      (error: unknown) => {
        this.logger.log(`❌ Request Error: ${error instanceof Error ? error.message : String(error)}`);
        return Promise.reject(error);
      },
    );

    this.client.interceptors.response.use(
      (response) => {
        this.logger.log(
          `📥 Response Status: ${response.status} for ${response.config.method?.toUpperCase()} ${response.config.url}`,
        );
        return response;
      },
      (error: unknown) => {
        this.logger.log(`❌ Response Error: ${error instanceof Error ? error.message : String(error)}`);
        return Promise.reject(error);
      },
    );
  }

  private async request(
    path: string,
    context: string,
    params?: Record<string, QueryParamValue>,
  ): Promise<RawResponse> {
    const response = await this.client.get<unknown>(path, params ? { params } : undefined);

    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamError(response.status, response.data, context);
    }

    const link = response.headers['link'];
    return {
      status: response.status,
      data: response.data,
      link: typeof link === 'string' ? link : '',
    };
  }

  private parse<S extends z.ZodTypeAny>(schema: S, response: RawResponse, context: string): z.infer<S> {
    const result = schema.safeParse(response.data);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new UpstreamError(response.status, `unexpected response body (${issues})`, context);
    }
    return result.data;
  }

  async listAgents(): Promise<Agent[]> {
    return collectPages(async (page) => {
      const response = await this.request('/api/v2/agents', 'Listing agents', {
        page,
        per_page: AGENTS_PER_PAGE,
      });
      return {
        items: this.parse(AgentListSchema, response, 'Listing agents'),
        nextPage: parseLinkHeader(response.link).next,
      };
    });
  }

  async searchAgents(term: string): Promise<unknown> {
    const response = await this.request('/api/v2/agents/autocomplete', 'Searching agents', { term });
    return response.data;
  }

  async getAgentName(id: number): Promise<string | undefined> {
    const context = `Fetching agent ${id}`;
    const response = await this.request(`/api/agents/${id}`, context);
    const name = this.parse(AgentDetailSchema, response, context).agent?.user?.name;
    return name || undefined;
  }

  async getCurrentAgent(): Promise<CurrentAgent> {
    const response = await this.request('/api/_/bootstrap/me', 'Fetching current agent');
    return this.parse(CurrentAgentSchema, response, 'Fetching current agent');
  }

  async filterTickets(params: Record<string, QueryParamValue>): Promise<TicketPage> {
    const response = await this.request('/api/_/tickets', 'Filtering tickets', params);
    return this.toTicketPage(response, 'Filtering tickets');
  }

  async listTickets(page: number, perPage: number): Promise<TicketPage> {
    const response = await this.request('/api/v2/tickets', 'Listing tickets', { page, per_page: perPage });
    return this.toTicketPage(response, 'Listing tickets');
  }

  async getTicket(id: number): Promise<Ticket> {
    const context = `Fetching ticket ${id}`;
    const response = await this.request(`/api/v2/tickets/${id}`, context);
    return this.parse(TicketSchema, response, context);
  }

  async searchTickets(query: string): Promise<TicketSearchResult> {
    // The search API wants the whole query wrapped in double quotes.
    const quoted = /^".*"$/.test(query) ? query : `"${query}"`;
    const response = await this.request('/api/v2/search/tickets', 'Searching tickets', { query: quoted });
    return this.parse(TicketSearchSchema, response, 'Searching tickets');
  }

  async findSimilarTickets(id: number): Promise<unknown> {
    const response = await this.request(
      `/api/_/copilot/tickets/${id}/similar_tickets`,
      `Finding tickets similar to ${id}`,
    );
    return response.data;
  }

  private toTicketPage(response: RawResponse, context: string): TicketPage {
    const body = this.parse(TicketListSchema, response, context);
    const { next, prev } = parseLinkHeader(response.link);
    return {
      tickets: Array.isArray(body) ? body : body.tickets,
      next_page: next,
      prev_page: prev,
    };
  }
}

import { z } from 'zod';
import { MomentumHttpError, MomentumResponseError } from '@core/errors';
import type { CitizenDirectory } from '@core/ports';
import {
  caseworkerSchema,
  citizenSchema,
  citizenSearchResultSchema,
  exemptionStatusSchema,
  jobLogSchema,
  jobSearchDefinitionSchema,
  type Caseworker,
  type Citizen,
  type CitizenSearchFilter,
  type CitizenSearchResult,
  type CreateTaskInput,
  type ExemptionStatus,
  type JobLogEntry,
  type JobSearchDefinition,
} from '@core/records';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MomentumClientConfig {
  baseUrl: string;
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  apiKey: string;
  resource: string;
  timeoutMs: number;
}

const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.coerce.number(),
});

export const SEARCH_PAGE_SIZE = 500;

// Refresh a little before Momentum considers the token expired.
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

type HttpMethod = 'GET' | 'POST';

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class MomentumClient implements CitizenDirectory {
  private readonly config: MomentumClientConfig;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(config: MomentumClientConfig) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
  }

  getCitizen(cpr: string): Promise<Citizen | null> {
    return this.request('GET', `/citizens/cpr/${encodeURIComponent(cpr)}`, citizenSchema);
  }

  /**
   * Collects every result page. Stops on a short page, once `totalCount` is
   * covered, or when Momentum answers the same page twice.
   */
  async searchCitizens(filters: readonly CitizenSearchFilter[]): Promise<CitizenSearchResult | null> {
    const data: CitizenSearchResult['data'] = [];
    let previousPage: string | null = null;

    for (let pageNumber = 0; ; pageNumber++) {
      const page = await this.request('POST', '/search/citizens', citizenSearchResultSchema, {
        filters,
        paging: { pageNumber, pageSize: SEARCH_PAGE_SIZE },
      });
      if (!page) {
        return pageNumber === 0 ? null : { data, totalCount: data.length };
      }

      const pageKey = page.data.map((c) => c.cpr).join(',');
      if (pageKey === previousPage) {
        console.warn(`[MOMENTUM] Search returned page ${pageNumber - 1} again; stopping at ${data.length} citizens`);
        return { data, totalCount: data.length };
      }
      previousPage = pageKey;

      data.push(...page.data);
      const lastPage =
        page.totalCount !== undefined && pageNumber + 1 >= Math.ceil(page.totalCount / SEARCH_PAGE_SIZE);
      if (page.data.length < SEARCH_PAGE_SIZE || lastPage) {
        return { data, totalCount: page.totalCount ?? data.length };
      }
    }
  }

  getExemptionStatus(citizen: Citizen): Promise<ExemptionStatus | null> {
    return this.request(
      'GET',
      `/citizens/${encodeURIComponent(citizen.id)}/personvisitationstatus`,
      exemptionStatusSchema,
    );
  }

  getJobSearchDefinition(citizen: Citizen): Promise<JobSearchDefinition | null> {
    return this.request(
      'GET',
      `/citizens/${encodeURIComponent(citizen.id)}/jobsearchdefinition`,
      jobSearchDefinitionSchema,
    );
  }

  getJobLog(citizen: Citizen): Promise<JobLogEntry[] | null> {
    return this.request('GET', `/citizens/${encodeURIComponent(citizen.id)}/joblog`, jobLogSchema);
  }

  findCaseworker(alias: string): Promise<Caseworker | null> {
    return this.request('GET', `/employees/initials/${encodeURIComponent(alias)}`, caseworkerSchema);
  }

  async createTask(input: CreateTaskInput): Promise<void> {
    const res = await this.send('POST', '/tasks', {
      citizenId: input.citizen.id,
      assignedActors: input.assignees.map((a) => a.id),
      deadline: input.dueDate.toISOString(),
      title: input.title,
      description: input.description,
    });
    if (!res) {
      throw new MomentumHttpError(404, '/tasks');
    }
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt - TOKEN_EXPIRY_MARGIN_MS > Date.now()) {
      return this.token.value;
    }

    const res = await fetch(this.config.tokenUrl, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        resource: this.config.resource,
      }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!res.ok) {
      throw new MomentumHttpError(res.status, 'token');
    }

    const parsed = tokenResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new MomentumResponseError('token', parsed.error.message);
    }

    this.token = {
      value: parsed.data.access_token,
      expiresAt: Date.now() + parsed.data.expires_in * 1000,
    };
    return this.token.value;
  }

  private async send(method: HttpMethod, path: string, body?: unknown): Promise<Response | null> {
    const token = await this.accessToken();
    const res = await fetch(`${this.config.baseUrl}${path}`, {
      method,
      headers: {
        accept: 'application/json',
        authorization: `Bearer ${token}`,
        apikey: this.config.apiKey,
        ...(body === undefined ? {} : { 'content-type': 'application/json' }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (res.status === 404) {
      return null;
    }
    if (!res.ok) {
      throw new MomentumHttpError(res.status, path);
    }
    return res;
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown,
  ): Promise<T | null> {
    const res = await this.send(method, path, body);
    if (!res) {
      return null;
    }

    const json: unknown = await res.json();
    if (json === null) {
      return null;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new MomentumResponseError(path, parsed.error.message);
    }
    return parsed.data;
  }
}

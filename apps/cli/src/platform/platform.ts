/**
 * Platform client
 * Composition root for one remote server: owns the transport, the object
 * cache and the server facts (version, edition, id) fetched once per run.
 */

import type {
  Edition,
  HttpMethod,
  NavigationGlobal,
  Paging,
  RequestParams,
  SystemStatus,
  TransportResponse,
} from '@sqconf/types';
import { ObjectCache } from '../cache/object-cache';
import { createLogger, Logger } from '../logger';
import { ApiError, UnsupportedOperationError } from './errors';
import { withRetry } from './retry';
import { Transport } from './transport';

export interface PlatformOptions {
  url: string;
  transport: Transport;
  cache?: ObjectCache;
  /** Retries of transient failures, 0 disables (default: 2) */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
}

const EDITIONS: readonly Edition[] = ['community', 'developer', 'enterprise', 'datacenter'];

/** Editions carrying applications */
export const APPLICATION_EDITIONS: readonly Edition[] = ['developer', 'enterprise', 'datacenter'];
export const PULL_REQUEST_EDITIONS: readonly Edition[] = ['developer', 'enterprise', 'datacenter'];
/** Editions carrying portfolios */
export const PORTFOLIO_EDITIONS: readonly Edition[] = ['enterprise', 'datacenter'];

export const DEFAULT_PAGE_SIZE = 500;

function isEdition(value: string): value is Edition {
  return EDITIONS.some((edition) => edition === value);
}

/**
 * Page extractor for paginated search APIs
 */
export type PageExtractor<P, D> = (page: P) => { items: D[]; paging?: Paging };

export class Platform {
  readonly url: string;
  readonly cache: ObjectCache;
  private readonly transport: Transport;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly log: Logger;
  private status?: SystemStatus;
  private serverEdition?: Edition;

  constructor(options: PlatformOptions) {
    this.url = options.url.replace(/\/+$/, '');
    this.transport = options.transport;
    this.cache = options.cache ?? new ObjectCache(this.url);
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.log = options.logger ?? createLogger({ component: 'platform' });
  }

  /**
   * Issue a request, retrying transport failures and rate limiting
   */
  async request(
    method: HttpMethod,
    path: string,
    params: RequestParams = {},
    signal?: AbortSignal
  ): Promise<TransportResponse> {
    this.log.debug(`${method} ${path}`, { params });
    return withRetry(() => this.transport.request(method, path, params, signal), {
      maxRetries: this.maxRetries,
      baseDelay: this.retryBaseDelayMs,
      signal,
      onRetry: (attempt, error, delay) =>
        this.log.warn(`Retrying ${method} ${path} in ${delay}ms (attempt ${attempt})`, {
          error: error.message,
        }),
    });
  }

  async getJson<T>(path: string, params: RequestParams = {}, signal?: AbortSignal): Promise<T> {
    const response = await this.request('GET', path, params, signal);
    return this.parse<T>(path, response);
  }

  async post(path: string, params: RequestParams = {}, signal?: AbortSignal): Promise<TransportResponse> {
    return this.request('POST', path, params, signal);
  }

  private parse<T>(path: string, response: TransportResponse): T {
    try {
      return JSON.parse(response.body) as T;
    } catch {
      throw new ApiError(response.status, `${path}: response is not valid JSON`);
    }
  }

  /**
   * Collect every page of a paginated search API
   */
  async searchAll<P, D>(
    path: string,
    params: RequestParams,
    extract: PageExtractor<P, D>,
    signal?: AbortSignal
  ): Promise<D[]> {
    const items: D[] = [];
    let page = 1;
    for (;;) {
      const data = await this.getJson<P>(path, { ...params, p: page, ps: DEFAULT_PAGE_SIZE }, signal);
      const { items: pageItems, paging } = extract(data);
      items.push(...pageItems);
      if (!paging || pageItems.length === 0 || page * paging.pageSize >= paging.total) {
        return items;
      }
      page++;
    }
  }

  private async systemStatus(): Promise<SystemStatus> {
    if (!this.status) {
      this.status = await this.getJson<SystemStatus>('system/status');
    }
    return this.status;
  }

  async version(): Promise<string> {
    return (await this.systemStatus()).version;
  }

  async serverId(): Promise<string> {
    return (await this.systemStatus()).id;
  }

  async edition(): Promise<Edition> {
    if (!this.serverEdition) {
      const nav = await this.getJson<NavigationGlobal>('navigation/global');
      const edition = nav.edition?.toLowerCase() ?? 'community';
      this.serverEdition = isEdition(edition) ? edition : 'community';
    }
    return this.serverEdition;
  }

  async supports(editions: readonly Edition[]): Promise<boolean> {
    return editions.includes(await this.edition());
  }

  /**
   * Fail with UnsupportedOperationError unless the server runs one of `editions`
   */
  async requireEdition(feature: string, editions: readonly Edition[]): Promise<void> {
    const edition = await this.edition();
    if (!editions.includes(edition)) {
      throw new UnsupportedOperationError(`${feature} are not available in ${edition} edition`);
    }
  }

  /** Absolute UI link to a server page */
  pageUrl(path: string): string {
    return `${this.url}/${path.replace(/^\/+/, '')}`;
  }

  toString(): string {
    return this.url;
  }
}

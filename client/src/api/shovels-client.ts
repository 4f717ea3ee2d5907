/**
 * Shovels API client
 *
 * Typed methods over the permit, contractor and location endpoints.
 * Methods that take several identifiers run one pagination chain per
 * identifier and flatten the results; a failed identifier is logged and
 * skipped. API reference: https://docs.shovels.ai/api-reference/
 */

import {
  API_KEY_HEADER,
  DEFAULT_BASE_URL,
  ValidationError,
  isDetailsLevel,
  isLocationLevel,
  isMetricsLevel,
  requireParams,
  systemClock,
  toIdList,
  US_STATES,
  validatePaginationOptions,
  type ApiItem,
  type ClientConfiguration,
  type Clock,
  type DetailsLevel,
  type LocationLevel,
  type MetricsLevel,
  type Observer,
  type QueryParams,
} from '@shovels-client/shared';
import { RequestExecutor, type FetchFunction, type RequestExecutorOptions } from '../http/executor.js';
import { Paginator, type FetchAllOptions } from '../pagination/paginator.js';
import { parsePageResponse } from '../pagination/response.js';
import { createConsoleObserver } from '../logging/console-observer.js';
import { withDateDefaults } from '../utils/dates.js';
import { fanOut } from './fan-out.js';

/** Most contractor IDs accepted by one lookup */
export const MAX_CONTRACTOR_IDS = 50;

export interface ShovelsClientOptions {
  /** API key (default: SHOVELS_API_KEY) */
  apiKey?: string;

  /** API root (default: SHOVELS_API_URL, then the public endpoint) */
  baseUrl?: string;

  /** Default per-request timeout in milliseconds */
  timeoutMs?: number;

  /** Extra headers sent with every request */
  headers?: Record<string, string>;

  /** Receives diagnostics (default: console at info level) */
  observer?: Observer;

  /** Time source for default date windows */
  clock?: Clock;

  /** fetch implementation (default: global fetch) */
  fetch?: FetchFunction;
}

export class ShovelsClient {
  readonly baseUrl: string;
  private readonly observer: Observer;
  private readonly clock: Clock;
  private readonly executor: RequestExecutor;
  private readonly paginator: Paginator;

  constructor(options: ShovelsClientOptions = {}) {
    const apiKey = options.apiKey ?? process.env['SHOVELS_API_KEY'];
    if (!apiKey) {
      throw new ValidationError('apiKey is required (pass it or set SHOVELS_API_KEY)');
    }

    this.baseUrl = (options.baseUrl ?? process.env['SHOVELS_API_URL'] ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.observer = options.observer ?? createConsoleObserver();
    this.clock = options.clock ?? systemClock;

    const executorOptions: RequestExecutorOptions = {
      headers: {
        Accept: 'application/json',
        ...options.headers,
        [API_KEY_HEADER]: apiKey,
      },
      observer: this.observer,
    };
    if (options.timeoutMs !== undefined) executorOptions.timeoutMs = options.timeoutMs;
    if (options.fetch !== undefined) executorOptions.fetch = options.fetch;

    this.executor = new RequestExecutor(executorOptions);
    this.paginator = new Paginator(this.executor, this.observer);
  }

  /**
   * Build a client from loaded configuration, logging at its level
   */
  static fromConfig(
    config: ClientConfiguration,
    options: Omit<ShovelsClientOptions, 'apiKey' | 'baseUrl' | 'timeoutMs'> = {},
  ): ShovelsClient {
    const clientOptions: ShovelsClientOptions = {
      observer: createConsoleObserver({ level: config.logLevel }),
      ...options,
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
    };
    if (config.timeoutMs !== undefined) clientOptions.timeoutMs = config.timeoutMs;
    return new ShovelsClient(clientOptions);
  }

  // ==========================================================================
  // Locations & residents
  // ==========================================================================

  /**
   * Search locations at one level by free text.
   * Returns an empty list when the request fails.
   */
  async searchLocation(query: string, level: LocationLevel): Promise<ApiItem[]> {
    if (!isLocationLevel(level)) {
      throw new ValidationError(`Unsupported location level: ${String(level)}`, { level });
    }

    const result = await this.executor.execute(this.url(level, 'search'), { q: query });
    return result.ok ? parsePageResponse(result.value).items : [];
  }

  /**
   * Monthly metrics per geo ID.
   *
   * `metric_from` and `metric_to` default to the last 180 days;
   * `property_type` and `tag` are required.
   */
  async getLocationMonthlyMetrics(
    geoIds: string | readonly string[],
    level: MetricsLevel,
    params: QueryParams,
    options: FetchAllOptions = {},
  ): Promise<ApiItem[]> {
    this.requireMetricsLevel(level);
    validatePaginationOptions(options);
    const batchParams = withDateDefaults(params, 'metric_from', 'metric_to', this.clock);
    requireParams(batchParams, ['property_type', 'tag'], 'monthly metrics');

    const result = await fanOut(
      toIdList(geoIds),
      'monthly metrics',
      (geoId) => this.paginator.run(this.url(level, geoId, 'metrics', 'monthly'), batchParams, options),
      this.observer,
    );
    return result.items;
  }

  /**
   * Current metrics per geo ID. `property_type` and `tag` are required.
   */
  async getLocationCurrentMetrics(
    geoIds: string | readonly string[],
    level: MetricsLevel,
    params: QueryParams,
    options: FetchAllOptions = {},
  ): Promise<ApiItem[]> {
    this.requireMetricsLevel(level);
    validatePaginationOptions(options);
    const batchParams: QueryParams = { ...params };
    requireParams(batchParams, ['property_type', 'tag'], 'current metrics');

    const result = await fanOut(
      toIdList(geoIds),
      'current metrics',
      (geoId) => this.paginator.run(this.url(level, geoId, 'metrics', 'current'), batchParams, options),
      this.observer,
    );
    return result.items;
  }

  /**
   * Details per geo ID. For addresses use {@link getResidents}.
   */
  async getLocationDetails(
    geoIds: string | readonly string[],
    level: DetailsLevel,
    options: FetchAllOptions = {},
  ): Promise<ApiItem[]> {
    const requested: string = level;
    if (requested === 'addresses') {
      throw new ValidationError('For addresses, use the getResidents method.', { level: requested });
    }
    if (!isDetailsLevel(requested)) {
      throw new ValidationError(`Unsupported details level: ${requested}`, { level: requested });
    }
    validatePaginationOptions(options);

    const url = this.url(level);
    const result = await fanOut(
      toIdList(geoIds),
      'details',
      (geoId) => this.paginator.run(url, { geo_id: geoId }, options),
      this.observer,
    );
    return result.items;
  }

  async getResidents(geoIds: string | readonly string[], options: FetchAllOptions = {}): Promise<ApiItem[]> {
    validatePaginationOptions(options);

    const result = await fanOut(
      toIdList(geoIds),
      'residents',
      (geoId) => this.paginator.run(this.url('addresses', geoId, 'residents'), undefined, options),
      this.observer,
    );
    return result.items;
  }

  // ==========================================================================
  // Contractors
  // ==========================================================================

  /**
   * Search contractors per geo ID (default: every US state).
   * `permit_from` and `permit_to` default to the last 180 days.
   */
  async searchContractors(
    geoIds?: string | readonly string[],
    params?: QueryParams,
    options: FetchAllOptions = {},
  ): Promise<ApiItem[]> {
    return this.searchByGeo('contractors', geoIds, params, options);
  }

  /**
   * Look up contractors by ID, at most 50 per call
   */
  async getContractorsById(
    contractorIds: string | readonly string[],
    options: FetchAllOptions = {},
  ): Promise<ApiItem[]> {
    const ids = toIdList(contractorIds);
    if (ids.length > MAX_CONTRACTOR_IDS) {
      throw new ValidationError(
        `length of contractorIds must be less than or equal to ${MAX_CONTRACTOR_IDS}`,
        { count: ids.length },
      );
    }

    return this.paginator.fetchAll(this.url('contractors'), { id: ids }, options);
  }

  async getPermitsByContractorId(
    contractorIds: string | readonly string[],
    options: FetchAllOptions = {},
  ): Promise<ApiItem[]> {
    validatePaginationOptions(options);

    const result = await fanOut(
      toIdList(contractorIds),
      'contractor permits',
      (id) => this.paginator.run(this.url('contractors', id, 'permits'), undefined, options),
      this.observer,
    );
    return result.items;
  }

  /**
   * Monthly metrics per contractor, filtered by `params`.
   *
   * `metric_from` and `metric_to` default to the last 180 days;
   * `property_type` and `tag` are required.
   */
  async getFilteredMetricsByContractorId(
    contractorIds: string | readonly string[],
    params: QueryParams,
    options: FetchAllOptions = {},
  ): Promise<ApiItem[]> {
    validatePaginationOptions(options);
    const batchParams = withDateDefaults(params, 'metric_from', 'metric_to', this.clock);
    requireParams(batchParams, ['property_type', 'tag'], 'filtered metrics');

    const result = await fanOut(
      toIdList(contractorIds),
      'contractor metrics',
      (id) => this.paginator.run(this.url('contractors', id, 'metrics'), batchParams, options),
      this.observer,
    );
    return result.items;
  }

  async listContractorEmployees(
    contractorIds: string | readonly string[],
    options: FetchAllOptions = {},
  ): Promise<ApiItem[]> {
    validatePaginationOptions(options);

    const result = await fanOut(
      toIdList(contractorIds),
      'contractor employees',
      (id) => this.paginator.run(this.url('contractors', id, 'employees'), undefined, options),
      this.observer,
    );
    return result.items;
  }

  // ==========================================================================
  // Permits
  // ==========================================================================

  /**
   * Search permits per geo ID (default: every US state).
   * `permit_from` and `permit_to` default to the last 180 days.
   */
  async searchPermits(
    geoIds?: string | readonly string[],
    params?: QueryParams,
    options: FetchAllOptions = {},
  ): Promise<ApiItem[]> {
    return this.searchByGeo('permits', geoIds, params, options);
  }

  async getPermitsById(permitIds: string | readonly string[], options: FetchAllOptions = {}): Promise<ApiItem[]> {
    return this.paginator.fetchAll(this.url('permits'), { id: toIdList(permitIds) }, options);
  }

  // ==========================================================================
  // Lists & meta
  // ==========================================================================

  /**
   * All permit tags. Returns an empty list when the request fails.
   */
  async getTags(): Promise<ApiItem[]> {
    const result = await this.executor.execute(this.url('list', 'tags'), { size: 100 });
    return result.ok ? parsePageResponse(result.value).items : [];
  }

  /**
   * Date of the current data release as YYYY-MM-DD, or null when unavailable
   */
  async getDataReleaseDate(): Promise<string | null> {
    const result = await this.executor.execute(this.url('meta', 'release'));
    if (!result.ok) {
      return null;
    }

    const releasedAt = result.value['released_at'];
    if (typeof releasedAt !== 'string' || !/^\d{4}-\d{2}-\d{2}/.test(releasedAt)) {
      this.observer.record('error', `Unexpected released_at value: ${JSON.stringify(releasedAt)}`);
      return null;
    }
    return releasedAt.slice(0, 10);
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  private async searchByGeo(
    resource: 'permits' | 'contractors',
    geoIds: string | readonly string[] | undefined,
    params: QueryParams | undefined,
    options: FetchAllOptions,
  ): Promise<ApiItem[]> {
    validatePaginationOptions(options);
    const batchParams = withDateDefaults(params, 'permit_from', 'permit_to', this.clock);
    const url = this.url(resource, 'search');

    const result = await fanOut(
      geoIds === undefined ? US_STATES : toIdList(geoIds),
      resource,
      (geoId) => this.paginator.run(url, { ...batchParams, geo_id: geoId }, options),
      this.observer,
    );
    return result.items;
  }

  private requireMetricsLevel(level: MetricsLevel): void {
    if (!isMetricsLevel(level)) {
      throw new ValidationError(`Unsupported metrics level: ${String(level)}`, { level });
    }
  }

  private url(...segments: string[]): string {
    return [this.baseUrl, ...segments.map((segment) => encodeURIComponent(segment))].join('/');
  }
}

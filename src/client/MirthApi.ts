/**
 * Mirth Connect API session
 *
 * Wraps axios to provide typed access to the Mirth Connect REST API. A
 * session logs in once (POST /users/_login) and replays the JSESSIONID
 * cookie on every later request. Responses are XML and are parsed into
 * the models under ../models.
 *
 * Usage:
 *   const mirth = new MirthApi({ baseUrl: 'https://mirth.local:8443/api' });
 *   await mirth.login('admin', 'admin');
 *   const channels = await mirth.getChannels();
 *   await mirth.close();
 */

import https from 'https';
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { ClientConfig } from '../config/ClientConfig.js';
import { DEFAULT_TIMEOUT_MS } from '../config/ClientConfig.js';
import { getLogger, type Logger } from '../logging/index.js';
import { LoginResponse, SUCCESSFUL_LOGIN_STATUSES } from '../models/auth.js';
import {
  ChannelList,
  ChannelModel,
  ChannelStatisticsList,
  DashboardStatusList,
  GroupList,
  type ChannelGroup,
  type ChannelStatistics,
  type DashboardStatus,
} from '../models/channels.js';
import { EVENT_OUTCOMES, EventList, EventModel } from '../models/events.js';
import { LongResponse } from '../models/messages.js';
import { Channel } from './Channel.js';
import { MirthApiError, MirthError, MirthLoginError } from './errors.js';

export type QueryValue = string | number | boolean | Array<string | number | boolean> | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface MirthApiOptions {
  /** API root, e.g. https://localhost:8443/api */
  baseUrl: string;
  /** Verify the server's TLS certificate (default true) */
  verifySsl?: boolean;
  /** Request timeout in milliseconds */
  timeout?: number;
  logger?: Logger;
}

export interface MirthResponse {
  status: number;
  text: string;
  setCookie: string[];
}

export interface RequestOptions {
  params?: QueryParams;
  /** Accept header override; the API defaults to XML */
  accept?: string;
}

export interface PostOptions extends RequestOptions {
  body?: string;
  contentType?: string;
}

export interface EventQuery {
  limit?: number;
  offset?: number;
  /** Event level, e.g. INFORMATION, WARNING, ERROR */
  level?: string;
  /** Only SUCCESS or FAILURE are sent */
  outcome?: string;
  userId?: number;
  /** Searches the event name for this string */
  name?: string;
}

/**
 * Render query parameters. Array values repeat the key
 * (status=ERROR&status=SENT); undefined values are skipped.
 */
export function buildQueryString(params: QueryParams = {}): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      search.append(key, String(item));
    }
  }
  const qs = search.toString();
  return qs ? `?${qs}` : '';
}

/**
 * Pull the JSESSIONID pair out of Set-Cookie headers
 */
export function extractSessionCookie(setCookie: string[]): string | null {
  for (const cookie of setCookie) {
    const pair = cookie.split(';')[0]?.trim();
    if (pair?.startsWith('JSESSIONID=')) {
      return pair;
    }
  }
  return null;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function toMirthResponse(response: AxiosResponse<unknown>): MirthResponse {
  const rawCookies: unknown = response.headers?.['set-cookie'];
  const setCookie = Array.isArray(rawCookies)
    ? rawCookies.filter((c): c is string => typeof c === 'string')
    : typeof rawCookies === 'string'
      ? [rawCookies]
      : [];

  return {
    status: response.status,
    text: typeof response.data === 'string' ? response.data : '',
    setCookie,
  };
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

export class MirthApi {
  readonly base: string;
  /** Server version, known after login or getServerVersion() */
  version: string | null = null;

  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private sessionCookie: string | null = null;
  private loggedIn = false;
  private closed = false;

  constructor(options: MirthApiOptions) {
    this.base = options.baseUrl.replace(/\/+$/, '');
    this.logger = options.logger ?? getLogger('mirth-api');

    this.http = axios.create({
      baseURL: this.base,
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      headers: {
        Accept: 'application/xml',
        // Mirth 4 rejects API calls without this header (CSRF guard)
        'X-Requested-With': 'mirth-rest-client',
      },
      responseType: 'text',
      // Status codes are checked by the client
      validateStatus: () => true,
      httpsAgent: options.verifySsl === false ? new https.Agent({ rejectUnauthorized: false }) : undefined,
    });
  }

  static fromConfig(config: ClientConfig, logger?: Logger): MirthApi {
    return new MirthApi({
      baseUrl: config.url,
      verifySsl: config.verifySsl,
      timeout: config.timeout,
      logger,
    });
  }

  // ===========================================================================
  // HTTP
  // ===========================================================================

  private headers(extra: Record<string, string | undefined>): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.sessionCookie) {
      headers['Cookie'] = this.sessionCookie;
    }
    for (const [key, value] of Object.entries(extra)) {
      if (value !== undefined) headers[key] = value;
    }
    return headers;
  }

  private async send(method: 'GET' | 'POST', path: string, options: PostOptions = {}): Promise<MirthResponse> {
    if (this.closed) {
      throw new MirthError('Session is closed');
    }

    const url = path + buildQueryString(options.params);
    const headers = this.headers({ Accept: options.accept, 'Content-Type': options.contentType });

    const response =
      method === 'GET'
        ? await this.http.get<unknown>(url, { headers })
        : await this.http.post<unknown>(url, options.body, { headers });

    this.logger.debug(`${method} ${url} -> ${response.status}`);
    return toMirthResponse(response);
  }

  private ensureOk(method: string, path: string, response: MirthResponse): MirthResponse {
    if (isSuccess(response.status)) {
      return response;
    }
    throw new MirthApiError(
      `${method} ${path} failed with HTTP ${response.status}`,
      response.status,
      response.text || undefined
    );
  }

  /**
   * GET a path relative to the API root. Non-2xx responses throw MirthApiError.
   */
  async get(path: string, options: RequestOptions = {}): Promise<MirthResponse> {
    return this.ensureOk('GET', path, await this.send('GET', path, options));
  }

  /**
   * POST to a path relative to the API root. Non-2xx responses throw MirthApiError.
   */
  async post(path: string, options: PostOptions = {}): Promise<MirthResponse> {
    return this.ensureOk('POST', path, await this.send('POST', path, options));
  }

  // ===========================================================================
  // Authentication
  // ===========================================================================

  /**
   * Log in and keep the session cookie for later requests.
   * Throws MirthLoginError on bad credentials or an unreadable response.
   */
  async login(username: string, password: string): Promise<LoginResponse> {
    const response = await this.send('POST', '/users/_login', {
      body: new URLSearchParams({ username, password }).toString(),
      contentType: 'application/x-www-form-urlencoded',
    });

    let loginStatus: LoginResponse;
    try {
      loginStatus = LoginResponse.parse(response.text);
    } catch (error) {
      this.logger.warn(`Login for ${username} returned an unreadable response (HTTP ${response.status})`);
      throw new MirthLoginError('Unable to log in', { cause: error });
    }

    if (!isSuccess(response.status) || !SUCCESSFUL_LOGIN_STATUSES.includes(loginStatus.status)) {
      this.logger.warn(`Login failed for ${username}: ${loginStatus.status}`);
      throw new MirthLoginError(
        loginStatus.message ? `Unable to log in: ${loginStatus.message}` : 'Unable to log in'
      );
    }

    const cookie = extractSessionCookie(response.setCookie);
    if (cookie) {
      this.sessionCookie = cookie;
    } else {
      this.logger.warn('Login succeeded but no JSESSIONID cookie was returned');
    }
    this.loggedIn = true;
    this.logger.info(`Logged in to ${this.base} as ${username}`);

    try {
      await this.getServerVersion();
    } catch (error) {
      this.logger.warn('Could not determine server version', error instanceof Error ? error : undefined);
    }

    return loginStatus;
  }

  async logout(): Promise<void> {
    if (!this.loggedIn) return;
    try {
      await this.post('/users/_logout');
    } finally {
      this.sessionCookie = null;
      this.loggedIn = false;
    }
  }

  isLoggedIn(): boolean {
    return this.loggedIn;
  }

  /**
   * End the session. Later requests throw.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    try {
      await this.logout();
    } finally {
      this.closed = true;
    }
  }

  // ===========================================================================
  // Server
  // ===========================================================================

  async getServerVersion(): Promise<string> {
    const response = await this.get('/server/version', { accept: 'text/plain' });
    this.version = response.text.trim();
    return this.version;
  }

  // ===========================================================================
  // Channels
  // ===========================================================================

  /**
   * All channels, optionally only those whose name matches exactly
   */
  async getChannels(name?: string): Promise<Channel[]> {
    const response = await this.get('/channels');
    if (isBlank(response.text)) return [];

    const channels = ChannelList.parse(response.text).channel.map((info) => new Channel(this, info.id, info));
    return name ? channels.filter((channel) => channel.name === name) : channels;
  }

  async getChannel(id: string): Promise<Channel | null> {
    const response = await this.get(`/channels/${id}`);
    if (isBlank(response.text)) return null;

    const info = ChannelModel.parse(response.text);
    return new Channel(this, info.id, info);
  }

  /**
   * Handle for a channel id without fetching it
   */
  channel(id: string): Channel {
    return new Channel(this, id);
  }

  async getChannelGroups(): Promise<ChannelGroup[]> {
    const response = await this.get('/channelgroups');
    if (isBlank(response.text)) return [];
    return GroupList.parse(response.text).channelGroup;
  }

  async getChannelStatisticsList(): Promise<ChannelStatistics[]> {
    const response = await this.get('/channels/statistics');
    if (isBlank(response.text)) return [];
    return ChannelStatisticsList.parse(response.text).channelStatistics;
  }

  async getDashboardStatuses(): Promise<DashboardStatus[]> {
    const response = await this.get('/channels/statuses');
    if (isBlank(response.text)) return [];
    return DashboardStatusList.parse(response.text).dashboardStatus;
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  private eventFilterParams(query: EventQuery): QueryParams {
    const params: QueryParams = {};
    if (query.level) params['level'] = query.level;
    if (query.outcome && EVENT_OUTCOMES.some((outcome) => outcome === query.outcome)) {
      params['outcome'] = query.outcome;
    }
    if (query.userId !== undefined) params['userId'] = query.userId;
    if (query.name) params['name'] = query.name;
    return params;
  }

  /**
   * A page of server events, newest first
   */
  async getEvents(query: EventQuery = {}): Promise<EventModel[]> {
    const params: QueryParams = {
      limit: query.limit ?? 20,
      offset: query.offset ?? 0,
      ...this.eventFilterParams(query),
    };

    const response = await this.get('/events', { params });
    if (isBlank(response.text)) return [];
    return EventList.parse(response.text).event;
  }

  async getEvent(id: number | string): Promise<EventModel | null> {
    const response = await this.get(`/events/${id}`);
    if (isBlank(response.text)) return null;
    return EventModel.parse(response.text);
  }

  async getEventCount(query: Omit<EventQuery, 'limit' | 'offset'> = {}): Promise<number> {
    const response = await this.get('/events/count', { params: this.eventFilterParams(query) });
    return LongResponse.parse(response.text);
  }
}

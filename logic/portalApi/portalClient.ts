/**
 * Portal Client
 * Session handling, equipment inventory and energy data for a single SolarEdge site
 */
import { AuthenticationError, FetchError } from './errors';
import { flattenEquipmentTree, parseEnergyData } from './responseParser';
import { extractErrorMessage } from '../utils/errorUtils';
import { MILLISECONDS_PER_MINUTE, MILLISECONDS_PER_SECOND } from '../utils/dateUtils';
import {
  TimeUnit,
  type EnergyData,
  type EquipmentData,
  type EquipmentMap,
  type HttpClient,
  type HttpRequestOptions,
  type HttpResponse,
  type PortalClientOptions,
  type PortalCredentials,
  type PortalLogger,
  type StoredCookie,
} from './types';

export const PORTAL_DOMAIN = 'monitoring.solaredge.com';
export const LOGIN_URL = `https://${PORTAL_DOMAIN}/solaredge-apigw/api/login`;
export const PLAYBACK_URL = `https://${PORTAL_DOMAIN}/solaredge-web/p/playbackData`;

export const SSO_COOKIE_NAME = 'SolarEdge_SSO-1.4';
export const CSRF_COOKIE_NAME = 'CSRF-TOKEN';

export const DEFAULT_TIMEOUT_SECONDS = 10;

/**
 * Re-login this long before the SSO cookie's max-age runs out
 */
const LOGIN_SAFETY_MARGIN_MS = 10 * MILLISECONDS_PER_MINUTE;

export function layoutUrl(siteId: string): string {
  return `https://${PORTAL_DOMAIN}/solaredge-apigw/api/sites/${encodeURIComponent(siteId)}/layout/logical`;
}

/**
 * Client for one site on the SolarEdge monitoring portal.
 * Not safe for concurrent use by several callers.
 */
export class PortalClient {
  readonly siteId: string;
  private readonly credentials: PortalCredentials;
  private readonly httpClient: HttpClient;
  private readonly timeoutMs: number;
  private readonly logger: PortalLogger;
  private equipment: EquipmentMap = new Map<number, EquipmentData>();
  private lastLogin: number = 0;

  constructor(
    credentials: PortalCredentials,
    siteId: string,
    httpClient: HttpClient,
    options: PortalClientOptions = {},
  ) {
    this.credentials = credentials;
    this.siteId = siteId;
    this.httpClient = httpClient;
    this.timeoutMs = (options.timeout ?? DEFAULT_TIMEOUT_SECONDS) * MILLISECONDS_PER_SECOND;
    this.logger = options.logger ?? console;
  }

  /**
   * Time of the last successful login (ms since epoch), 0 if none
   */
  get lastLoginTime(): number {
    return this.lastLogin;
  }

  get equipmentCount(): number {
    return this.equipment.size;
  }

  /**
   * Log in unless the SSO cookie from the previous login is still good
   */
  async login(): Promise<void> {
    const ssoCookie = this.httpClient.findCookie(PORTAL_DOMAIN, SSO_COOKIE_NAME);
    if (ssoCookie && this.isSessionValid(ssoCookie)) {
      this.logger.log('[LOGIN] Skipping login, using existing SSO cookie');
      return;
    }

    // Equipment may differ under the new session
    this.equipment = new Map<number, EquipmentData>();

    const response = await this.send('LOGIN', LOGIN_URL, {
      method: 'POST',
      form: {
        j_username: this.credentials.username,
        j_password: this.credentials.password,
      },
    });

    if (!response.ok) {
      const body = await response.text().catch(() => 'Unknown error');
      this.logger.error(`[LOGIN] Login failed with status ${response.status}`);
      throw new AuthenticationError(`Login failed with status ${response.status}`, response.status, body);
    }

    this.lastLogin = Date.now();
    this.logger.log('[LOGIN] Login successful');
  }

  /**
   * Get the site's equipment as a map of equipment ID to equipment data.
   * Cached until the next full login.
   */
  async getEquipment(): Promise<ReadonlyMap<number, EquipmentData>> {
    this.logger.log(`[EQUIPMENT] Fetching equipment for site ${this.siteId}`);
    await this.login();

    if (this.equipment.size > 0) {
      this.logger.log(`[EQUIPMENT] Using ${this.equipment.size} cached equipment for site ${this.siteId}`);
      return this.equipment;
    }

    const url = layoutUrl(this.siteId);
    const response = await this.send('EQUIPMENT', url, { method: 'GET' });
    const text = await response.text();

    if (!response.ok) {
      this.logger.error(`[EQUIPMENT] Layout request failed with status ${response.status}`);
      throw new FetchError(`Equipment request failed with status ${response.status}`, response.status, text);
    }

    let layout: unknown;
    try {
      layout = JSON.parse(text);
    } catch (error) {
      throw new FetchError(`Equipment response is not JSON: ${extractErrorMessage(error)}`, response.status, text);
    }

    this.equipment = flattenEquipmentTree(layout);
    this.logger.log(`[EQUIPMENT] Found ${this.equipment.size} equipment for site ${this.siteId}`);
    return this.equipment;
  }

  /**
   * Get 15-minute energy data (Wh per equipment) for the given window.
   * Samples are in the order the portal returns them.
   */
  async getEnergyData(timeUnit: TimeUnit = TimeUnit.WEEK): Promise<EnergyData[]> {
    this.logger.log(`[ENERGY] Fetching energy data for site ${this.siteId}`);
    await this.login();

    const csrfCookie = this.httpClient.findCookie(PORTAL_DOMAIN, CSRF_COOKIE_NAME);
    if (!csrfCookie || !csrfCookie.value) {
      this.logger.error(`[ENERGY] ${CSRF_COOKIE_NAME} not found in cookies`);
      throw new AuthenticationError(`${CSRF_COOKIE_NAME} not found in cookies`);
    }

    const response = await this.send('ENERGY', PLAYBACK_URL, {
      method: 'POST',
      headers: { 'X-CSRF-TOKEN': csrfCookie.value },
      form: { fieldId: this.siteId, timeUnit },
    });
    const text = await response.text();

    if (!response.ok) {
      this.logger.error(`[ENERGY] Playback request failed with status ${response.status}`);
      throw new FetchError(`Energy data request failed with status ${response.status}`, response.status, text);
    }

    const energyData = parseEnergyData(text);
    this.logger.log(`[ENERGY] Found ${energyData.length} energy data for site ${this.siteId}`);
    return energyData;
  }

  private isSessionValid(ssoCookie: StoredCookie): boolean {
    if (ssoCookie.maxAge === undefined) {
      return false;
    }
    const elapsed = Date.now() - this.lastLogin;
    return elapsed < ssoCookie.maxAge * MILLISECONDS_PER_SECOND - LOGIN_SAFETY_MARGIN_MS;
  }

  /**
   * Send a request with the configured timeout; transport errors are logged and rethrown
   */
  private async send(
    context: string,
    url: string,
    options: Omit<HttpRequestOptions, 'timeoutMs'>,
  ): Promise<HttpResponse> {
    try {
      const response = await this.httpClient.request(url, { ...options, timeoutMs: this.timeoutMs });
      this.logger.log(`[${context}] Got ${response.status} from ${url}`);
      return response;
    } catch (error: unknown) {
      this.logger.error(`[${context}] Request to ${url} failed:`, extractErrorMessage(error));
      throw error;
    }
  }
}

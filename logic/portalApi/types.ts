/**
 * Portal API Types
 * TypeScript interfaces for the SolarEdge monitoring web portal
 */

/**
 * Energy window requested from the playback endpoint.
 * The portal accepts codes 0-8, but only DAY and WEEK return data.
 */
export enum TimeUnit {
  DAY = 4,
  WEEK = 5,
}

/**
 * Energy readings for a single reporting interval (15 minutes)
 */
export interface EnergyData {
  startTime: Date;
  values: Map<number, number>; // equipment ID -> production energy (Wh)
}

/**
 * Attributes of one equipment node (inverter, optimizer, string, ...)
 */
export interface EquipmentData {
  id: number;
  [field: string]: unknown;
}

export type EquipmentMap = Map<number, EquipmentData>;

/**
 * Portal login credentials
 */
export interface PortalCredentials {
  username: string;
  password: string;
}

/**
 * Logger used by the client (console-compatible)
 */
export interface PortalLogger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Options for PortalClient
 */
export interface PortalClientOptions {
  timeout?: number; // seconds
  logger?: PortalLogger;
}

/**
 * Cookie as held by the HTTP client's cookie jar
 */
export interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  maxAge?: number;    // seconds, as declared by the server
  expiresAt?: number; // Unix timestamp in milliseconds
  createdAt: number;
}

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequestOptions {
  method: HttpMethod;
  headers?: Record<string, string>;
  form?: Record<string, string | number>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

/**
 * Transport used by PortalClient: form requests plus a per-domain cookie store
 */
export interface HttpClient {
  request(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
  findCookie(domain: string, name: string): StoredCookie | undefined;
}


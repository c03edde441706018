/**
 * Portal configuration from environment variables
 */
import { DEFAULT_TIMEOUT_SECONDS } from './portalApi/portalClient';
import type { PortalCredentials } from './portalApi/types';

export interface PortalConfig {
  credentials: PortalCredentials;
  siteId: string;
  timeout: number; // seconds
}

type Env = Record<string, string | undefined>;

/**
 * Read SOLAREDGE_USERNAME, SOLAREDGE_PASSWORD, SOLAREDGE_SITE_ID and optional SOLAREDGE_TIMEOUT
 */
export function loadPortalConfig(env: Env = process.env): PortalConfig {
  const problems: string[] = [];

  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      problems.push(`${name} is not set`);
      return '';
    }
    return value;
  };

  const username = required('SOLAREDGE_USERNAME');
  const password = required('SOLAREDGE_PASSWORD');
  const siteId = required('SOLAREDGE_SITE_ID');

  let timeout = DEFAULT_TIMEOUT_SECONDS;
  const rawTimeout = env.SOLAREDGE_TIMEOUT?.trim();
  if (rawTimeout) {
    const parsed = Number(rawTimeout);
    if (Number.isInteger(parsed) && parsed > 0) {
      timeout = parsed;
    } else {
      problems.push(`SOLAREDGE_TIMEOUT must be a positive integer, got "${rawTimeout}"`);
    }
  }

  if (problems.length > 0) {
    throw new Error(`Invalid portal configuration: ${problems.join('; ')}`);
  }

  return { credentials: { username, password }, siteId, timeout };
}

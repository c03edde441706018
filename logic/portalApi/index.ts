/**
 * Portal API Module
 * Exports all SolarEdge portal functionality
 */

export * from './types';
export * from './errors';
export * from './cookieJar';
export * from './httpClient';
export * from './responseParser';
export * from './portalClient';

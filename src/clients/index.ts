/**
 * External Service Clients
 *
 * HTTP clients for standalone services, accessed over HTTP only.
 */

// Forecast backend API
export { ForecastClient, USER_AGENT } from './forecast.client.js';

export type { ForecastClientConfig } from './forecast.client.js';

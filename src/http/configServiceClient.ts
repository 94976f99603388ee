/**
 * Configuration Service Client
 *
 * Fetches enabled interfaces and their destination adapter instances from
 * the external configuration service. Nothing is cached: every tick gets a
 * fresh snapshot.
 */

import type { Logger } from 'pino';
import { ApiError } from '../errors/index.js';
import { httpGet } from '../util/http.js';
import { isValidUrl, ValidationError } from '../util/validation.js';
import { parseSnapshot } from '../config/snapshot.js';
import type { ConfigurationSnapshot, ConfigurationSource } from '../models/configuration.js';

/**
 * Endpoint: {serviceUrl}/interfaces?enabled=true
 *
 * @example
 * interfacesUrl('http://localhost:7071/api/')
 * // Returns: http://localhost:7071/api/interfaces?enabled=true
 */
export function interfacesUrl(serviceUrl: string): string {
  if (!isValidUrl(serviceUrl)) {
    throw new ValidationError(`Invalid configuration service URL: ${serviceUrl}`, 'serviceUrl');
  }
  return `${serviceUrl.replace(/\/+$/, '')}/interfaces?enabled=true`;
}

export class HttpConfigurationSource implements ConfigurationSource {
  private readonly url: string;

  constructor(
    serviceUrl: string,
    private readonly log: Logger,
    private readonly timeoutMs = 10000
  ) {
    this.url = interfacesUrl(serviceUrl);
  }

  async loadSnapshot(signal?: AbortSignal): Promise<ConfigurationSnapshot> {
    const res = await httpGet<unknown>(this.url, { signal, timeoutMs: this.timeoutMs });
    if (res.status !== 200) {
      throw new ApiError(`Configuration service returned ${res.status}`, this.url, res.status);
    }
    const { snapshot, warnings } = parseSnapshot(res.data);
    for (const warning of warnings) this.log.warn({ url: this.url }, warning);
    this.log.debug({ interfaces: snapshot.interfaces.length }, 'configuration snapshot loaded');
    return snapshot;
  }
}

/**
 * Configuration Source Selection
 */

import type { Logger } from 'pino';
import { ValidationError } from '../util/validation.js';
import { HttpConfigurationSource } from '../http/configServiceClient.js';
import { FileConfigurationSource } from './fileConfigurationSource.js';
import type { ConfigurationSource } from '../models/configuration.js';

export interface ConfigurationSourceSettings {
  serviceUrl: string;
  file: string;
}

/**
 * Picks the configuration service when a URL is set, else the JSON file
 *
 * @throws ValidationError when neither is configured
 */
export function createConfigurationSource(settings: ConfigurationSourceSettings, log: Logger): ConfigurationSource {
  if (settings.serviceUrl) {
    log.info({ url: settings.serviceUrl }, 'using configuration service');
    return new HttpConfigurationSource(settings.serviceUrl, log);
  }
  if (settings.file) {
    log.info({ path: settings.file }, 'using configuration file');
    return new FileConfigurationSource(settings.file, log);
  }
  throw new ValidationError('Set CONFIG_SERVICE_URL or RELAY_CONFIG_FILE', 'configSource');
}

/**
 * File Configuration Source
 *
 * Reads the configuration document from a JSON file on every tick, so edits
 * take effect on the next tick without a restart.
 */

import { readFile } from 'fs/promises';
import type { Logger } from 'pino';
import { ValidationError } from '../util/validation.js';
import { parseSnapshot } from './snapshot.js';
import type { ConfigurationSnapshot, ConfigurationSource } from '../models/configuration.js';

export class FileConfigurationSource implements ConfigurationSource {
  constructor(
    private readonly path: string,
    private readonly log: Logger
  ) {}

  async loadSnapshot(signal?: AbortSignal): Promise<ConfigurationSnapshot> {
    const text = await readFile(this.path, { encoding: 'utf-8', signal });
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ValidationError(
        `Configuration file ${this.path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        'configFile'
      );
    }
    const { snapshot, warnings } = parseSnapshot(raw);
    for (const warning of warnings) this.log.warn({ path: this.path }, warning);
    return snapshot;
  }
}

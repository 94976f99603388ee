import { describe, it, expect } from 'vitest';
import { createConfigurationSource } from '../../src/config/source.js';
import { FileConfigurationSource } from '../../src/config/fileConfigurationSource.js';
import { HttpConfigurationSource } from '../../src/http/configServiceClient.js';
import { ValidationError } from '../../src/errors/index.js';
import { silentLogger } from '../helpers.js';

describe('createConfigurationSource', () => {
  it('should prefer the configuration service over the file', () => {
    const source = createConfigurationSource(
      { serviceUrl: 'http://config.local:8080', file: 'config/interfaces.json' },
      silentLogger
    );

    expect(source).toBeInstanceOf(HttpConfigurationSource);
  });

  it('should fall back to the file', () => {
    const source = createConfigurationSource({ serviceUrl: '', file: 'config/interfaces.json' }, silentLogger);

    expect(source).toBeInstanceOf(FileConfigurationSource);
  });

  it('should require one of them', () => {
    expect(() => createConfigurationSource({ serviceUrl: '', file: '' }, silentLogger)).toThrow(ValidationError);
  });
});

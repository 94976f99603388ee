import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HttpConfigurationSource, interfacesUrl } from '../../src/http/configServiceClient.js';
import { httpGet } from '../../src/util/http.js';
import { ApiError, ValidationError } from '../../src/errors/index.js';
import { DEST_1, silentLogger } from '../helpers.js';

vi.mock('../../src/util/http.js', () => ({
  httpGet: vi.fn(),
  httpPost: vi.fn()
}));

const mockGet = vi.mocked(httpGet);

describe('interfacesUrl', () => {
  it('should append the enabled interfaces path', () => {
    expect(interfacesUrl('http://config.local:7071/api')).toBe('http://config.local:7071/api/interfaces?enabled=true');
    expect(interfacesUrl('http://config.local:7071/api//')).toBe('http://config.local:7071/api/interfaces?enabled=true');
  });

  it('should reject an invalid URL', () => {
    expect(() => interfacesUrl('config.local')).toThrow(ValidationError);
  });
});

describe('HttpConfigurationSource', () => {
  beforeEach(() => {
    mockGet.mockReset();
  });

  it('should parse the service response into a snapshot', async () => {
    mockGet.mockResolvedValue({
      status: 200,
      data: { interfaces: [{ interfaceName: 'Orders', destinations: [{ instanceId: DEST_1, adapterName: 'Csv' }] }] }
    });
    const source = new HttpConfigurationSource('http://config.local:7071/api', silentLogger, 2500);

    const snapshot = await source.loadSnapshot();

    expect(snapshot.interfaces.map(i => i.interfaceName)).toEqual(['Orders']);
    expect(snapshot.interfaces[0].destinations[0].instanceId).toBe(DEST_1);
    expect(mockGet).toHaveBeenCalledWith('http://config.local:7071/api/interfaces?enabled=true', {
      signal: undefined,
      timeoutMs: 2500
    });
  });

  it('should fetch a fresh snapshot on every load', async () => {
    mockGet.mockResolvedValue({ status: 200, data: { interfaces: [] } });
    const source = new HttpConfigurationSource('http://config.local:7071/api', silentLogger);

    await source.loadSnapshot();
    await source.loadSnapshot();

    expect(mockGet).toHaveBeenCalledTimes(2);
  });

  it('should throw ApiError when the service does not answer 200', async () => {
    mockGet.mockResolvedValue({ status: 500 });
    const source = new HttpConfigurationSource('http://config.local:7071/api', silentLogger);

    await expect(source.loadSnapshot()).rejects.toBeInstanceOf(ApiError);
  });

  it('should reject a body that is not a configuration document', async () => {
    mockGet.mockResolvedValue({ status: 200, data: '<html></html>' });
    const source = new HttpConfigurationSource('http://config.local:7071/api', silentLogger);

    await expect(source.loadSnapshot()).rejects.toBeInstanceOf(ValidationError);
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HttpAdapterGateway, parseDeliveryResponse } from '../../src/http/adapterHostGateway.js';
import { httpPost } from '../../src/util/http.js';
import { ApiError, ValidationError } from '../../src/errors/index.js';
import type { Message } from '../../src/models/messages.js';
import { DEST_1, PRODUCER_A, destination } from '../helpers.js';

vi.mock('../../src/util/http.js', () => ({
  httpGet: vi.fn(),
  httpPost: vi.fn()
}));

const mockPost = vi.mocked(httpPost);

function claimed(id: string): Message {
  const at = new Date('2026-01-05T09:00:00.000Z');
  return {
    id,
    interfaceName: 'Orders',
    sourceAdapterName: 'Csv',
    adapterInstanceId: PRODUCER_A,
    payload: { headers: ['OrderId'], record: { OrderId: id } },
    payloadHash: 'hash',
    status: 'Claimed',
    retryCount: 1,
    lastError: 'timeout',
    claimedBy: DEST_1,
    claimedAt: at,
    processedAt: null,
    createdAt: at,
    updatedAt: at
  };
}

describe('parseDeliveryResponse', () => {
  it('should read processed and failed outcomes', () => {
    expect(
      parseDeliveryResponse({
        outcomes: [
          { messageId: 'm1', status: 'Processed' },
          { messageId: 'm2', status: 'Failed', reason: 'table locked' }
        ]
      })
    ).toEqual([
      { messageId: 'm1', status: 'Processed' },
      { messageId: 'm2', status: 'Failed', reason: 'table locked' }
    ]);
  });

  it('should supply a reason for failures without one', () => {
    expect(parseDeliveryResponse({ outcomes: [{ messageId: 'm1', status: 'Failed', reason: '' }] })).toEqual([
      { messageId: 'm1', status: 'Failed', reason: 'Adapter reported failure without a reason' }
    ]);
  });

  it('should drop unreadable entries', () => {
    expect(
      parseDeliveryResponse({ outcomes: [{ status: 'Processed' }, { messageId: 'm2', status: 'Skipped' }, 'm3'] })
    ).toEqual([]);
  });

  it('should reject a body without outcomes', () => {
    expect(() => parseDeliveryResponse({ results: [] })).toThrow(ValidationError);
    expect(() => parseDeliveryResponse(undefined)).toThrow(ValidationError);
  });
});

describe('HttpAdapterGateway', () => {
  beforeEach(() => {
    mockPost.mockReset();
  });

  it('should reject an invalid host URL', () => {
    expect(() => new HttpAdapterGateway('not a url', 1000)).toThrow(ValidationError);
  });

  it('should post the batch to the adapter endpoint', async () => {
    mockPost.mockResolvedValue({ status: 200, data: { outcomes: [{ messageId: 'm1', status: 'Processed' }] } });
    const gateway = new HttpAdapterGateway('http://adapters.local:7072/', 5000);
    const signal = new AbortController().signal;
    const instance = destination(DEST_1, { adapterName: 'Sql Server', configuration: { table: 'dbo.Orders' } });

    const outcomes = await gateway.deliver(instance, [claimed('m1')], signal);

    expect(outcomes).toEqual([{ messageId: 'm1', status: 'Processed' }]);
    expect(mockPost).toHaveBeenCalledWith(
      'http://adapters.local:7072/adapters/Sql%20Server/deliver',
      {
        instance: {
          instanceId: DEST_1,
          instanceName: instance.instanceName,
          interfaceName: 'Orders',
          configuration: { table: 'dbo.Orders' }
        },
        messages: [
          { id: 'm1', payload: { headers: ['OrderId'], record: { OrderId: 'm1' } }, retryCount: 1, sourceAdapterName: 'Csv' }
        ]
      },
      { signal, timeoutMs: 5000 }
    );
  });

  it('should throw ApiError on a non-2xx response', async () => {
    mockPost.mockResolvedValue({ status: 503, data: 'busy' });
    const gateway = new HttpAdapterGateway('http://adapters.local:7072', 5000);

    const attempt = gateway.deliver(destination(DEST_1), [claimed('m1')], new AbortController().signal);

    await expect(attempt).rejects.toBeInstanceOf(ApiError);
    await expect(attempt).rejects.toThrow("Adapter host returned 503 for 'SqlServer'");
  });
});

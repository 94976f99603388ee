/**
 * Adapter Host Gateway
 *
 * Delivers claimed batches to the adapter host over HTTP. The host runs the
 * destination adapters (CSV, SQL, SAP, ...) and answers with one outcome
 * per message.
 *
 * Request:  POST {hostUrl}/adapters/{adapterName}/deliver
 *           { instance: {...}, messages: [{ id, payload, retryCount }] }
 * Response: { outcomes: [{ messageId, status: 'Processed' | 'Failed', reason? }] }
 */

import { ApiError } from '../errors/index.js';
import { httpPost } from '../util/http.js';
import { isRecord, isValidUrl, ValidationError } from '../util/validation.js';
import type { AdapterGateway } from '../relay/adapterGateway.js';
import type { AdapterInstance } from '../models/configuration.js';
import type { DeliveryOutcome, Message } from '../models/messages.js';

const DEFAULT_FAILURE_REASON = 'Adapter reported failure without a reason';

function toOutcome(value: unknown): DeliveryOutcome | null {
  if (!isRecord(value) || typeof value.messageId !== 'string') return null;
  if (value.status === 'Processed') return { messageId: value.messageId, status: 'Processed' };
  if (value.status === 'Failed') {
    const reason = typeof value.reason === 'string' && value.reason ? value.reason : DEFAULT_FAILURE_REASON;
    return { messageId: value.messageId, status: 'Failed', reason };
  }
  return null;
}

/**
 * Reads the outcomes array from an adapter host response
 *
 * @throws ValidationError when the body has no outcomes array
 *
 * @example
 * parseDeliveryResponse({ outcomes: [{ messageId: 'm1', status: 'Processed' }] })
 * // Returns: [{ messageId: 'm1', status: 'Processed' }]
 */
export function parseDeliveryResponse(body: unknown): DeliveryOutcome[] {
  if (!isRecord(body) || !Array.isArray(body.outcomes)) {
    throw new ValidationError('Adapter host response must contain an outcomes array', 'outcomes');
  }
  const outcomes: DeliveryOutcome[] = [];
  for (const entry of body.outcomes) {
    const outcome = toOutcome(entry);
    // Unreadable entries are dropped; the message then counts as having no outcome
    if (outcome) outcomes.push(outcome);
  }
  return outcomes;
}

export class HttpAdapterGateway implements AdapterGateway {
  private readonly baseUrl: string;

  constructor(
    hostUrl: string,
    private readonly timeoutMs: number
  ) {
    if (!isValidUrl(hostUrl)) {
      throw new ValidationError(`Invalid adapter host URL: ${hostUrl}`, 'hostUrl');
    }
    this.baseUrl = hostUrl.replace(/\/+$/, '');
  }

  async deliver(instance: AdapterInstance, messages: readonly Message[], signal: AbortSignal): Promise<DeliveryOutcome[]> {
    const url = `${this.baseUrl}/adapters/${encodeURIComponent(instance.adapterName)}/deliver`;
    const body = {
      instance: {
        instanceId: instance.instanceId,
        instanceName: instance.instanceName,
        interfaceName: instance.interfaceName,
        configuration: instance.configuration
      },
      messages: messages.map(m => ({
        id: m.id,
        payload: m.payload,
        retryCount: m.retryCount,
        sourceAdapterName: m.sourceAdapterName
      }))
    };

    const res = await httpPost<unknown>(url, body, { signal, timeoutMs: this.timeoutMs });
    if (res.status < 200 || res.status >= 300) {
      throw new ApiError(`Adapter host returned ${res.status} for '${instance.adapterName}'`, url, res.status);
    }
    return parseDeliveryResponse(res.data);
  }
}

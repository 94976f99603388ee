/**
 * Dead Letter Monitor
 *
 * Read-side reporting over messages that exhausted their retries.
 */

import { REPORTING, RELAY_DEFAULTS } from '../core/constants.js';
import type { MessageStore } from './messageStore.js';
import type { Message } from '../models/messages.js';

export interface DeadLetterStats {
  count: number;
  oldest: Date;
  newest: Date;
  /** Most frequent error reasons with their counts, most frequent first */
  commonErrors: Array<{ error: string; count: number }>;
}

/** Upper bound on dead letters read for one report */
const SCAN_LIMIT = 10000;

export class DeadLetterMonitor {
  constructor(private readonly store: MessageStore) {}

  async count(interfaceName?: string): Promise<number> {
    const counts = await this.store.countByStatus(interfaceName);
    return counts.DeadLetter;
  }

  /**
   * Most recently dead-lettered messages first
   */
  async recent(count = 10, interfaceName?: string): Promise<Message[]> {
    const deadLetters = await this.store.listMessages({ status: 'DeadLetter', interfaceName, limit: SCAN_LIMIT });
    return deadLetters
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, count);
  }

  /**
   * Dead-letter statistics grouped by interface
   */
  async stats(): Promise<Record<string, DeadLetterStats>> {
    const deadLetters = await this.store.listMessages({ status: 'DeadLetter', limit: SCAN_LIMIT });
    const grouped = new Map<string, Message[]>();
    for (const m of deadLetters) {
      const group = grouped.get(m.interfaceName) ?? [];
      group.push(m);
      grouped.set(m.interfaceName, group);
    }

    const stats: Record<string, DeadLetterStats> = {};
    for (const [interfaceName, messages] of grouped) {
      const times = messages.map(m => m.updatedAt.getTime());
      const errors = new Map<string, number>();
      for (const m of messages) {
        if (m.lastError) errors.set(m.lastError, (errors.get(m.lastError) ?? 0) + 1);
      }
      stats[interfaceName] = {
        count: messages.length,
        oldest: new Date(Math.min(...times)),
        newest: new Date(Math.max(...times)),
        commonErrors: [...errors.entries()]
          .sort((a, b) => b[1] - a[1])
          .slice(0, REPORTING.TOP_ERRORS)
          .map(([error, count]) => ({ error, count }))
      };
    }
    return stats;
  }

  async isThresholdExceeded(
    threshold: number = RELAY_DEFAULTS.DEAD_LETTER_THRESHOLD,
    interfaceName?: string
  ): Promise<boolean> {
    return (await this.count(interfaceName)) > threshold;
  }
}

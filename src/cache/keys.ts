/**
 * Redis Key Generators
 *
 * Centralized key naming for the relay's Redis entries.
 */

export const KEYS = {
  /** Holder token of the cross-process tick lease; expires on its own */
  tickLease: (prefix = 'relay') => `${prefix}:tick:lease`,
};

/**
 * Shared plumbing for the in-memory repositories
 */

import { throwIfCancelled } from '../../utils/cancellation';

export const copy = <T>(value: T): T => structuredClone(value);

export const slugKey = (...parts: string[]): string => parts.map((part) => part.trim().toLowerCase()).join('|');

/**
 * Yield once, then honour the cancellation signal
 */
export async function tick(signal?: AbortSignal): Promise<void> {
  await Promise.resolve();
  throwIfCancelled(signal);
}

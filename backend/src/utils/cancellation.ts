import { PromotionError, PromotionErrorCode } from '../types/content';

/**
 * Throw CANCELLED when the signal has fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, context?: Record<string, unknown>): void {
  if (!signal?.aborted) return;
  throw new PromotionError(PromotionErrorCode.CANCELLED, 'operation cancelled', context, { cause: signal.reason });
}

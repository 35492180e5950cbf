import {
  PromotionError,
  PromotionErrorCode,
  ServiceResponse,
  errorCodeOf,
  errorMessage
} from '../types/content';

export function ok<T>(data: T, metadata?: Record<string, unknown>): ServiceResponse<T> {
  return metadata ? { success: true, data, metadata } : { success: true, data };
}

/**
 * Failure envelope for a caught error
 */
export function fail<T>(error: unknown, fallback: string): ServiceResponse<T> {
  return {
    success: false,
    error: errorMessage(error, fallback),
    errorCode: errorCodeOf(error)
  };
}

/**
 * Data of a successful response; a failed one is rethrown as a PromotionError
 */
export function unwrap<T>(response: ServiceResponse<T>): T {
  if (response.success && response.data !== undefined) {
    return response.data;
  }
  throw new PromotionError(
    response.errorCode ?? PromotionErrorCode.INTERNAL_ERROR,
    response.error ?? 'Unknown error'
  );
}

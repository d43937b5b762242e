// SPDX-License-Identifier: Apache-2.0
/**
 * Shared failure envelope.
 *
 * Every route answers failures with the same body:
 *   { success: false, code: string, message: string, ...extra }
 *
 * Generic helpers live here; service-specific codes stay in their packages.
 */

export interface FailureBody {
  success: false;
  code: string;
  message: string;
  [extra: string]: unknown;
}

export function failure(code: string, message: string, extra: Record<string, unknown> = {}): FailureBody {
  return { ...extra, success: false, code, message };
}

export function invalidRequest(message: string): FailureBody {
  return failure("invalid_request", message);
}

export function notFound(message: string): FailureBody {
  return failure("not_found", message);
}

export function internalError(message = "Internal server error"): FailureBody {
  return failure("internal_error", message);
}

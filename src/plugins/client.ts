/**
 * Collaborator client helpers shared by the bundled resource types.
 *
 * Client libraries report HTTP failures as an `Error` carrying a numeric
 * `statusCode` (and optionally a `code`). These helpers translate that
 * shape into the engine's `NotFoundError` / `TransportError`.
 */

import {
  NotFoundError,
  TransportError,
  formatErrorMessage,
  isEngineError,
  type EngineError,
} from "../errors.js";

/** Error shape thrown by collaborator clients. */
export type ClientError = Error & {
  statusCode: number;
  code?: string;
};

export function isClientError(error: unknown): error is ClientError {
  return (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  );
}

/**
 * Build a client error; used by client implementations and test fakes.
 */
export function createClientError(statusCode: number, message: string, code?: string): ClientError {
  return Object.assign(new Error(message), { statusCode, code });
}

/**
 * Translate anything a client threw. `notFoundMessage` is used when the
 * client answered 404.
 */
export function translateClientError(error: unknown, notFoundMessage: string): EngineError {
  if (isEngineError(error)) return error;

  if (isClientError(error)) {
    if (error.statusCode === 404) return new NotFoundError(notFoundMessage);
    return new TransportError(error.message, {
      statusCode: error.statusCode,
      code: error.code,
      cause: error,
    });
  }

  const code =
    error instanceof Error && "code" in error && typeof error.code === "string"
      ? error.code
      : undefined;
  return new TransportError(formatErrorMessage(error), { code, cause: error });
}

/**
 * Await a client call, translating its failure.
 */
export async function callClient<T>(call: () => Promise<T>, notFoundMessage: string): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw translateClientError(error, notFoundMessage);
  }
}

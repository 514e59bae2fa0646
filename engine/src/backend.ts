import { BackendFailureError } from "./errors.js";

function asBackendFailure(operation: string, err: unknown): BackendFailureError {
  return err instanceof BackendFailureError ? err : new BackendFailureError(operation, err);
}

/** Run a backend call, reporting anything it throws as a BackendFailureError. */
export function callBackend<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw asBackendFailure(operation, err);
  }
}

export async function callBackendAsync<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw asBackendFailure(operation, err);
  }
}

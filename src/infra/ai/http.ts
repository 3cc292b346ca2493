import { FatalUpstreamError, TransientUpstreamError } from "../../domain/errors.js";

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

export function classifyHttpFailure(
  label: string,
  status: number,
  body: string,
): TransientUpstreamError | FatalUpstreamError {
  const message = `${label} failed (${status}): ${body.slice(0, 500)}`;
  return isTransientStatus(status)
    ? new TransientUpstreamError(message, status)
    : new FatalUpstreamError(message, status);
}

/**
 * POSTs JSON and returns the decoded body. Network failures are transient;
 * an aborted request rethrows the abort reason untouched.
 */
export async function postJson(
  label: string,
  url: string,
  body: unknown,
  options: { headers?: Record<string, string>; signal?: AbortSignal } = {},
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...options.headers,
      },
      body: JSON.stringify(body),
      signal: options.signal,
    });
  } catch (error) {
    if (options.signal?.aborted) {
      throw options.signal.reason;
    }
    throw new TransientUpstreamError(`${label} request failed: ${describe(error)}`, null, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw classifyHttpFailure(label, response.status, await response.text());
  }

  try {
    return await response.json();
  } catch (error) {
    throw new FatalUpstreamError(`${label} returned a non-JSON body.`, response.status, {
      cause: error,
    });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

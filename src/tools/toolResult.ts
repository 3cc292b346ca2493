import { describeError, isAppError } from "../domain/errors.js";

export function jsonResult(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

/** Reports a failed call to the client instead of failing the JSON-RPC request. */
export function errorResult(error: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(
          { error: describeError(error), code: isAppError(error) ? error.code : null },
          null,
          2,
        ),
      },
    ],
    isError: true,
  };
}

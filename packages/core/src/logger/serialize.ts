/**
 * Convert log payloads into JSON-safe values.
 *
 * `Error` instances serialize to `{}` with `JSON.stringify`, so they are
 * expanded into name/message (plus `code` and `cause` when present).
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const result: Record<string, unknown> = {
    name: error.name,
    message: error.message,
  };

  if ("code" in error && error.code !== undefined) {
    result.code = error.code;
  }

  if (error.cause !== undefined) {
    result.cause = serializeError(error.cause);
  }

  return result;
}

export function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return serializeError(data);
  }

  if (typeof data === "object" && data !== null && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = value instanceof Error ? serializeError(value) : value;
    }
    return out;
  }

  return data;
}

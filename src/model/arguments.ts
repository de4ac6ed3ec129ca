// pattern: Functional Core

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode tool-call arguments into an object.
 * Accepts an object or a JSON string encoding one; anything else yields null.
 */
export function parseToolArguments(raw: unknown): Record<string, unknown> | null {
  if (isPlainObject(raw)) {
    return raw;
  }
  if (typeof raw !== "string") {
    return null;
  }
  if (raw.trim() === "") {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function serializeToolArguments(raw: unknown): string {
  return typeof raw === "string" ? raw : JSON.stringify(raw ?? {});
}

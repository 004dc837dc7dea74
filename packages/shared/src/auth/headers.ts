/** Fastify hands repeated headers over as arrays; only the first value counts. */
export function firstHeaderValue(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return typeof first === "string" ? firstHeaderValue(first) : null;
  }
  return null;
}

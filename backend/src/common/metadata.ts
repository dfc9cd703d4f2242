export type ScalarValue = string | number | boolean | null;

export type ScalarMetadata = Record<string, ScalarValue>;

export function toScalarMetadata(
  input: Record<string, unknown> | undefined,
): ScalarMetadata {
  const result: ScalarMetadata = {};
  if (!input) {
    return result;
  }
  for (const [key, value] of Object.entries(input)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'boolean' ||
      (typeof value === 'number' && Number.isFinite(value))
    ) {
      result[key] = value;
    }
  }
  return result;
}

export function cosineSimilarity(
  left: readonly number[],
  right: readonly number[],
): number {
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }
  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

export function toVectorLiteral(values?: readonly number[] | null): string | null {
  if (!values || values.length === 0) {
    return null;
  }
  const joined = values.join(',');
  return `[${joined}]`;
}

export function parseVector(
  value: string | number[] | null | undefined,
): number[] {
  if (!value) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map(number);
  }

  const trimmed = value.trim().replace(/^\[|\]$/g, '');
  if (!trimmed) {
    return [];
  }
  return trimmed.split(',').map(number);
}

function number(token: string | number): number {
  return typeof token === 'number' ? token : Number.parseFloat(token);
}

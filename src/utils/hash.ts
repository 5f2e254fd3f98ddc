function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(',')}}`;
  }

  return JSON.stringify(value) ?? 'undefined';
}

export function hashObject(value: unknown): string {
  const json = stableStringify(value);
  let hash = 0;

  for (let index = 0; index < json.length; index += 1) {
    const char = json.charCodeAt(index);
    hash = (hash << 5) - hash + char;
    hash |= 0;
  }

  return hash.toString(16);
}

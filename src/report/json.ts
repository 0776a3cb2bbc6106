function toPlain(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (value instanceof Set) {
    return [...value];
  }
  return value;
}

/** Maps become objects and sets become arrays. */
export function renderJson(payload: unknown): string {
  return `${JSON.stringify(payload, toPlain, 2)}\n`;
}

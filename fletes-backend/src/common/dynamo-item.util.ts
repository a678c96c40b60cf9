/** Raw item as returned by the document client */
export type DynamoItem = Record<string, unknown>;

export function readString(item: DynamoItem, key: string, fallback = ''): string {
  const value = item[key];
  if (typeof value === 'string') {
    return value;
  }
  return typeof value === 'number' ? String(value) : fallback;
}

export function readOptionalString(item: DynamoItem, key: string): string | undefined {
  const value = item[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function readNumber(item: DynamoItem, key: string, fallback = 0): number {
  const value = item[key];
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return fallback;
}

export function readOptionalNumber(item: DynamoItem, key: string): number | undefined {
  return item[key] === undefined || item[key] === null ? undefined : readNumber(item, key);
}

export function readBoolean(item: DynamoItem, key: string, fallback = false): boolean {
  const value = item[key];
  return typeof value === 'boolean' ? value : fallback;
}

export function readRecord(item: DynamoItem, key: string): DynamoItem {
  const value = item[key];
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

export function readStringArray(item: DynamoItem, key: string): string[] {
  const value = item[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const asRecord = (value: unknown): JsonRecord => (isRecord(value) ? value : {});

export const readString = (record: JsonRecord, key: string): string | null => {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
};

export const readArray = (record: JsonRecord, key: string): unknown[] => {
  const value = record[key];
  return Array.isArray(value) ? value : [];
};

export const readRecords = (record: JsonRecord, key: string): JsonRecord[] =>
  readArray(record, key).filter(isRecord);

export const readStrings = (record: JsonRecord, key: string): string[] =>
  readArray(record, key).filter((entry): entry is string => typeof entry === 'string');

import { nanoid } from 'nanoid';

const WORDS_PER_MINUTE = 200;

//21 url-safe characters (~126 random bits)
export function getJobId(): string {
  return nanoid();
}

export function formatISODate(input?: Date | number): string {
  const date = input === undefined ? new Date() : new Date(input);
  return date.toISOString();
}

//code points, not UTF-16 units: a surrogate pair is one character
export function countCharacters(text: string): number {
  return [...text].length;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function readingTimeMinutes(wordCount: number): number {
  return Math.max(1, Math.floor(wordCount / WORDS_PER_MINUTE));
}

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }
  if (value && typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, item] of entries) {
      sorted[key] = normalize(item);
    }
    return sorted;
  }
  return value;
}

/**
 * JSON with object keys sorted at every depth; the same logical
 * content always serializes to the same string
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value));
}

function stripHexPrefix(value: string): string {
  return value.startsWith('0x') || value.startsWith('0X') ? value.slice(2) : value;
}

/**
 * normalizes an on-chain bytes32 reference (0x-prefixed or not) to
 * `0x` + 64 lowercase hex, left-padded with zeros; returns null if
 * the value is not hex or does not fit in 32 bytes
 */
export function toBytes32Hex(value: string): string | null {
  const hex = stripHexPrefix(value.trim());
  if (!/^[0-9a-fA-F]{1,64}$/.test(hex)) {
    return null;
  }
  return `0x${hex.toLowerCase().padStart(64, '0')}`;
}

//a transaction hash is exactly 32 bytes
export function toTxHash(value: string): string | null {
  const hex = stripHexPrefix(value.trim());
  if (!/^[0-9a-fA-F]{64}$/.test(hex)) {
    return null;
  }
  return `0x${hex.toLowerCase()}`;
}

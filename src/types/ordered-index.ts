export type KeyType = 'number' | 'string';
export type IndexKey = number | string;
export type SeekOp = 'ge' | 'le';
export type RangeDirection = 'asc' | 'desc';

export interface IndexEntry {
  key: IndexKey;
  value: unknown;
}

export interface RangeQuery {
  from?: IndexKey;          // Start key; omitted means the first (asc) or last (desc) entry
  direction: RangeDirection;
  limit: number;
  exclusive?: boolean;      // Skip an entry equal to `from`
}

export interface RangeResult {
  entries: IndexEntry[];
  nextKey: IndexKey | null; // Key to pass as `from` for the following page
}

export interface IndexStats {
  name: string;
  keyType: KeyType;
  size: number;
  min: IndexKey | null;
  max: IndexKey | null;
  height: number;
  lastUpdateTime: number;
}

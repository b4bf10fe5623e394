import { RegimeChange } from '../entities/regime-change.entity';
import { MarketRegime } from '../types/market-regime.type';

export type KeyValueWrite = readonly [key: string, value: string | null];

/** Durable string key-value storage. A null value clears the key. */
export interface IKeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string | null): Promise<void>;
  /** Applies every write or none of them. */
  setMany(writes: readonly KeyValueWrite[]): Promise<void>;
}

export interface RecordRegimeChange {
  fromRegime: MarketRegime;
  toRegime: MarketRegime;
  notified: boolean;
  changedAt: Date;
}

export interface IRegimeChangeRepository {
  record(change: RecordRegimeChange): Promise<RegimeChange>;
  findRecent(limit: number): Promise<RegimeChange[]>;
}

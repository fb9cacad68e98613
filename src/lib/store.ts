/**
 * Key-value contract of the ledger store
 *
 * Every method may reject with TransientStoreError. The store offers no
 * transactions: callers own the atomicity of any read-modify-write cycle.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  /**
   * @param ttlSeconds - Omit for a record that never expires
   */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  /**
   * Atomically add 1 to an integer counter, creating it at 1 when absent.
   * The TTL only applies when the counter is created.
   */
  increment(key: string, ttlSeconds?: number): Promise<number>;
  keys(prefix: string): Promise<string[]>;
}

import { debugPersist } from '../utils/debug.js';
import { persistKeyToString, type AcmePersist, type PersistKey } from './types.js';

/**
 * In-memory persistence. Values are copied in and out so callers cannot
 * mutate stored bytes.
 */
export class MemoryPersist implements AcmePersist {
  private readonly entries = new Map<string, Uint8Array>();

  async get(key: PersistKey): Promise<Uint8Array | undefined> {
    const value = this.entries.get(persistKeyToString(key));
    debugPersist('memory get %s hit=%s', persistKeyToString(key), value !== undefined);
    return value ? Uint8Array.from(value) : undefined;
  }

  async put(key: PersistKey, value: Uint8Array): Promise<void> {
    debugPersist('memory put %s length=%d', persistKeyToString(key), value.length);
    this.entries.set(persistKeyToString(key), Uint8Array.from(value));
  }

  get size(): number {
    return this.entries.size;
  }
}

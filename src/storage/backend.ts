/**
 * Abstract storage backend interface.
 */

export interface StorageBackend {
  /** Write data to the given key, replacing any previous content whole. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Read data from the given key. */
  read(key: string): Promise<Uint8Array>;

  /** List all keys with the given prefix. */
  list(prefix: string): Promise<string[]>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;
}

export async function readText(
  storage: StorageBackend,
  key: string,
): Promise<string> {
  return new TextDecoder().decode(await storage.read(key));
}

/**
 * In-process storage backend. Used for dry runs and tests.
 */
import type { StorageBackend } from "./backend.js";

export class MemoryStorage implements StorageBackend {
  private files = new Map<string, Uint8Array>();

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const bytes =
      typeof data === "string" ? new TextEncoder().encode(data) : data.slice();
    this.files.set(key, bytes);
  }

  async read(key: string): Promise<Uint8Array> {
    const data = this.files.get(key);
    if (!data) throw new Error(`No such key: ${key}`);
    return data;
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.files.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  async exists(key: string): Promise<boolean> {
    return this.files.has(key);
  }
}

import { ObjectStore } from "./objectStore";

export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, Buffer>();

  async putObject(key: string, body: Buffer | string, _contentType: string): Promise<void> {
    this.objects.set(key, typeof body === "string" ? Buffer.from(body, "utf-8") : body);
  }

  async getObject(key: string): Promise<string | undefined> {
    return this.objects.get(key)?.toString("utf-8");
  }

  async listKeys(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  async deleteKeys(keys: string[]): Promise<void> {
    for (const key of keys) {
      this.objects.delete(key);
    }
  }
}

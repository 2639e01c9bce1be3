import { AppConfig } from "../config";
import { RunStore } from "./types";
import { SqliteStore } from "./sqliteStore";

export function createStore(config: AppConfig): RunStore {
  return new SqliteStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";

import { AppConfig } from "../config";
import { InMemoryStore } from "./memoryStore";
import { SqliteStore } from "./sqliteStore";
import { HistoryStore } from "./types";

export function createStore(config: AppConfig, options: { inMemory?: boolean } = {}): HistoryStore {
  if (options.inMemory) {
    return new InMemoryStore();
  }
  return new SqliteStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";

export * from "./deploy/index.js";
export { NotionRecordStore, type NotionRecordStoreOptions } from "./store/notion-client.js";
export { collectPages } from "./store/paginate.js";
export {
  DEFAULT_PROPERTY_NAMES,
  readTitle,
  toModuleRecord,
  toSeed,
  toSeedSummary,
} from "./store/records.js";
export {
  InMemoryRecordStore,
  type InMemoryRecordStoreOptions,
  type MemorySeed,
  type MemoryModule,
} from "./store/memory-store.js";

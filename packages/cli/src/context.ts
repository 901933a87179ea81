import type { Config } from '@seedling/shared';
import { NotionRecordStore } from '@seedling/deployer';

export function createStore(config: Config): NotionRecordStore {
  return new NotionRecordStore({
    apiKey: config.notion.apiKey,
    apiVersion: config.notion.apiVersion,
    baseUrl: config.notion.baseUrl,
    timeoutMs: config.notion.timeoutMs,
  });
}

import { FetchFailure } from "@seedling/shared";
import type {
  Block,
  CodeBlock,
  DatabaseQuery,
  PageRecord,
  PropertyNames,
  QueryResult,
  RecordStore,
} from "@seedling/shared";
import { DEFAULT_PROPERTY_NAMES, readTitle } from "./records.js";

export interface MemorySeed {
  id: string;
  name: string;
  modules?: string[];
  command?: string;
}

export interface MemoryModule {
  id: string;
  filename?: string;
  path?: string;
  parentDatabaseId?: string;
  blocks?: CodeBlock[];
}

export interface InMemoryRecordStoreOptions {
  seedDatabaseId: string;
  properties?: PropertyNames;
  pageSize?: number;
}

/**
 * RecordStore held in process memory. Database queries page through
 * results with numeric offset cursors.
 */
export class InMemoryRecordStore implements RecordStore {
  readonly requests: string[] = [];
  private pages = new Map<string, PageRecord>();
  private children = new Map<string, Block[]>();
  private databases = new Map<string, PageRecord[]>();
  private names: PropertyNames;
  private options: InMemoryRecordStoreOptions;

  constructor(options: InMemoryRecordStoreOptions) {
    this.options = options;
    this.names = options.properties ?? DEFAULT_PROPERTY_NAMES;
  }

  addSeed(seed: MemorySeed): this {
    const page: PageRecord = {
      id: seed.id,
      parentDatabaseId: this.options.seedDatabaseId,
      properties: {
        [this.names.title]: { kind: "text", value: seed.name },
        [this.names.modules]: { kind: "relation", ids: seed.modules ?? [] },
        [this.names.command]: { kind: "text", value: seed.command ?? "" },
      },
    };
    return this.addPage(page, [], this.options.seedDatabaseId);
  }

  addModule(mod: MemoryModule): this {
    const page: PageRecord = {
      id: mod.id,
      parentDatabaseId: mod.parentDatabaseId,
      properties: {
        [this.names.title]: { kind: "text", value: mod.filename ?? "" },
      },
    };
    if (mod.path !== undefined) {
      page.properties[this.names.path] = { kind: "text", value: mod.path };
    }
    const blocks = (mod.blocks ?? []).map((block, i) => ({
      ...block,
      id: `${mod.id}-block-${i}`,
      type: block.kind === "code" ? "code" : "paragraph",
    }));
    return this.addPage(page, blocks);
  }

  addPage(page: PageRecord, blocks: Block[] = [], databaseId?: string): this {
    this.pages.set(page.id, page);
    this.children.set(page.id, blocks);
    if (databaseId) {
      const rows = this.databases.get(databaseId) ?? [];
      rows.push(page);
      this.databases.set(databaseId, rows);
    }
    return this;
  }

  async getPage(pageId: string): Promise<PageRecord> {
    this.requests.push(`getPage ${pageId}`);
    const page = this.pages.get(pageId);
    if (!page) {
      throw new FetchFailure(`GET /pages/${pageId} failed (404): object_not_found`, { status: 404 });
    }
    return page;
  }

  async getChildren(blockId: string): Promise<Block[]> {
    this.requests.push(`getChildren ${blockId}`);
    return this.children.get(blockId) ?? [];
  }

  async queryDatabase(
    databaseId: string,
    query: DatabaseQuery = {},
  ): Promise<QueryResult<PageRecord>> {
    this.requests.push(`queryDatabase ${databaseId}${query.startCursor ? ` @${query.startCursor}` : ""}`);
    const { filter } = query;
    const rows = (this.databases.get(databaseId) ?? []).filter((page) => {
      if (!filter) return true;
      const title = readTitle(page, { ...this.names, title: filter.property }) ?? "";
      return filter.matchKind === "equals" ? title === filter.value : title.includes(filter.value);
    });

    const start = query.startCursor ? Number(query.startCursor) : 0;
    const size = query.pageSize ?? this.options.pageSize ?? 100;
    const end = start + size;
    const hasMore = end < rows.length;
    return {
      results: rows.slice(start, end),
      hasMore,
      nextCursor: hasMore ? String(end) : null,
    };
  }
}

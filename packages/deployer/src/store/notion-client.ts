import { createLogger, FetchFailure, MalformedRecord } from "@seedling/shared";
import type {
  Block,
  DatabaseQuery,
  PageRecord,
  QueryResult,
  RecordStore,
} from "@seedling/shared";
import type { z } from "zod";
import { blockSchema, listSchema, pageSchema, toBlock, toPageRecord } from "./schemas.js";
import { collectPages } from "./paginate.js";

export interface NotionRecordStoreOptions {
  apiKey: string;
  apiVersion?: string;
  baseUrl?: string;
  // Applied per request; the pipeline itself never times out
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const DEFAULT_BASE_URL = "https://api.notion.com/v1";
const DEFAULT_API_VERSION = "2022-06-28";
const CHILDREN_PAGE_SIZE = 100;

const pageListSchema = listSchema(pageSchema);
const blockListSchema = listSchema(blockSchema);

/**
 * NotionRecordStore reads pages, block children and database queries from
 * the Notion REST API. Each call is a single attempt: failures surface as
 * FetchFailure and responses that do not match the expected shape as
 * MalformedRecord.
 */
export class NotionRecordStore implements RecordStore {
  private logger = createLogger("notion-store");
  private options: NotionRecordStoreOptions;
  private fetchImpl: typeof fetch;
  private baseUrl: string;

  constructor(options: NotionRecordStoreOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  }

  async getPage(pageId: string): Promise<PageRecord> {
    const data = await this.request("GET", `/pages/${encodeURIComponent(pageId)}`);
    return toPageRecord(this.validate(pageSchema, data, `page ${pageId}`));
  }

  async getChildren(blockId: string): Promise<Block[]> {
    return collectPages(async (cursor) => {
      const params = new URLSearchParams({ page_size: String(CHILDREN_PAGE_SIZE) });
      if (cursor) params.set("start_cursor", cursor);
      const data = await this.request(
        "GET",
        `/blocks/${encodeURIComponent(blockId)}/children?${params.toString()}`,
      );
      const list = this.validate(blockListSchema, data, `children of ${blockId}`);
      return {
        results: list.results.map(toBlock),
        hasMore: list.has_more,
        nextCursor: list.next_cursor ?? null,
      };
    }, `children of ${blockId}`);
  }

  async queryDatabase(
    databaseId: string,
    query: DatabaseQuery = {},
  ): Promise<QueryResult<PageRecord>> {
    const body: Record<string, unknown> = {};
    if (query.filter) {
      body.filter = {
        property: query.filter.property,
        title: { [query.filter.matchKind]: query.filter.value },
      };
    }
    if (query.startCursor) body.start_cursor = query.startCursor;
    if (query.pageSize) body.page_size = query.pageSize;

    const data = await this.request(
      "POST",
      `/databases/${encodeURIComponent(databaseId)}/query`,
      body,
    );
    const list = this.validate(pageListSchema, data, `query of ${databaseId}`);
    return {
      results: list.results.map(toPageRecord),
      hasMore: list.has_more,
      nextCursor: list.next_cursor ?? null,
    };
  }

  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug(`${method} ${url}`);

    let resp: Response;
    try {
      resp = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
          "Notion-Version": this.options.apiVersion ?? DEFAULT_API_VERSION,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: this.options.timeoutMs ? AbortSignal.timeout(this.options.timeoutMs) : undefined,
      });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new FetchFailure(`${method} ${path} failed: ${msg}`, { cause: err });
    }

    if (!resp.ok) {
      const text = await resp.text();
      throw new FetchFailure(`${method} ${path} failed (${resp.status}): ${text}`, {
        status: resp.status,
      });
    }

    try {
      return await resp.json();
    } catch (err) {
      throw new FetchFailure(`${method} ${path} returned invalid JSON`, {
        status: resp.status,
        cause: err,
      });
    }
  }

  private validate<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid";
      throw new MalformedRecord(`Unexpected response for ${what} (${where})`);
    }
    return parsed.data;
  }
}

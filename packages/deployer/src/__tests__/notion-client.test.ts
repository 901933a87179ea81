import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { FetchFailure, MalformedRecord, PaginationProtocolViolation } from "@seedling/shared";
import { NotionRecordStore } from "../store/notion-client.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const text = (content: string) => ({ plain_text: content, text: { content } });

describe("NotionRecordStore", () => {
  let fetchMock: Mock<typeof fetch>;
  let store: NotionRecordStore;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    store = new NotionRecordStore({ apiKey: "test-secret", fetch: fetchMock });
  });

  function call(index: number): { url: string; init: RequestInit | undefined } {
    const args = fetchMock.mock.calls[index];
    if (!args) throw new Error(`fetch call ${index} was not made`);
    return { url: String(args[0]), init: args[1] };
  }

  describe("getPage", () => {
    it("sends auth and version headers", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: "p1", properties: {} }));

      await store.getPage("p1");

      const { url, init } = call(0);
      expect(url).toBe("https://api.notion.com/v1/pages/p1");
      expect(init?.method).toBe("GET");
      expect(init?.headers).toEqual({
        Authorization: "Bearer test-secret",
        "Content-Type": "application/json",
        "Notion-Version": "2022-06-28",
      });
      expect(init?.body).toBeUndefined();
    });

    it("maps properties to typed values", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          object: "page",
          id: "p1",
          parent: { type: "database_id", database_id: "modules-db" },
          properties: {
            Reference: { id: "title", type: "title", title: [text("a.txt")] },
            Path: { id: "x", type: "rich_text", rich_text: [text("src"), text("/utils")] },
            Modules: { id: "y", type: "relation", relation: [{ id: "m1" }, { id: "m2" }] },
            Done: { id: "z", type: "checkbox", checkbox: true },
          },
        }),
      );

      const page = await store.getPage("p1");

      expect(page).toEqual({
        id: "p1",
        parentDatabaseId: "modules-db",
        properties: {
          Reference: { kind: "text", value: "a.txt" },
          Path: { kind: "text", value: "src/utils" },
          Modules: { kind: "relation", ids: ["m1", "m2"] },
          Done: { kind: "other", type: "checkbox" },
        },
      });
    });

    it("raises FetchFailure on an error status", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ code: "object_not_found" }, 404));

      const err: unknown = await store.getPage("p1").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(FetchFailure);
      expect(err).toMatchObject({
        status: 404,
        message: 'GET /pages/p1 failed (404): {"code":"object_not_found"}',
      });
    });

    it("raises FetchFailure when the request cannot be made", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(store.getPage("p1")).rejects.toThrow(
        new FetchFailure("GET /pages/p1 failed: fetch failed"),
      );
    });

    it("raises MalformedRecord for an unexpected shape", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ properties: {} }));

      await expect(store.getPage("p1")).rejects.toBeInstanceOf(MalformedRecord);
    });
  });

  describe("getChildren", () => {
    it("follows the children cursor", async () => {
      fetchMock
        .mockResolvedValueOnce(
          jsonResponse({
            results: [{ id: "b1", type: "paragraph", paragraph: { rich_text: [text("intro")] } }],
            has_more: true,
            next_cursor: "c1",
          }),
        )
        .mockResolvedValueOnce(
          jsonResponse({
            results: [
              { id: "b2", type: "code", code: { rich_text: [text("const a = 1;"), text("\n")], language: "typescript" } },
            ],
            has_more: false,
            next_cursor: null,
          }),
        );

      const blocks = await store.getChildren("p1");

      expect(call(0).url).toBe("https://api.notion.com/v1/blocks/p1/children?page_size=100");
      expect(call(1).url).toBe("https://api.notion.com/v1/blocks/p1/children?page_size=100&start_cursor=c1");
      expect(blocks).toEqual([
        { id: "b1", type: "paragraph", kind: "other", text: "" },
        { id: "b2", type: "code", kind: "code", text: "const a = 1;\n", language: "typescript" },
      ]);
    });

    it("reads code text from the legacy field", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          results: [{ id: "b1", type: "code", code: { text: [text("hello")], language: "plain text" } }],
          has_more: false,
        }),
      );

      const blocks = await store.getChildren("p1");

      expect(blocks[0]?.text).toBe("hello");
    });

    it("treats a code block without text as empty", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ results: [{ id: "b1", type: "code", code: { rich_text: [] } }], has_more: false }),
      );

      const blocks = await store.getChildren("p1");

      expect(blocks).toEqual([{ id: "b1", type: "code", kind: "code", text: "", language: undefined }]);
    });

    it("rejects has_more without a cursor", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ results: [], has_more: true, next_cursor: null }));

      await expect(store.getChildren("p1")).rejects.toBeInstanceOf(PaginationProtocolViolation);
    });
  });

  describe("queryDatabase", () => {
    it("posts a title filter", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ results: [], has_more: false, next_cursor: null }));

      await store.queryDatabase("seeds", {
        filter: { property: "Reference", matchKind: "contains", value: "Demo" },
      });

      const { url, init } = call(0);
      expect(url).toBe("https://api.notion.com/v1/databases/seeds/query");
      expect(init?.method).toBe("POST");
      expect(JSON.parse(String(init?.body))).toEqual({
        filter: { property: "Reference", title: { contains: "Demo" } },
      });
    });

    it("passes the cursor and returns the continuation", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          results: [{ id: "s2", properties: { Reference: { type: "title", title: [text("Two")] } } }],
          has_more: true,
          next_cursor: "next-1",
        }),
      );

      const result = await store.queryDatabase("seeds", { startCursor: "cur-1" });

      expect(JSON.parse(String(call(0).init?.body))).toEqual({ start_cursor: "cur-1" });
      expect(result).toEqual({
        results: [
          { id: "s2", parentDatabaseId: undefined, properties: { Reference: { kind: "text", value: "Two" } } },
        ],
        hasMore: true,
        nextCursor: "next-1",
      });
    });

    it("honours a custom base URL and API version", async () => {
      const custom = new NotionRecordStore({
        apiKey: "test-secret",
        apiVersion: "2021-05-13",
        baseUrl: "http://localhost:9999/v1/",
        fetch: fetchMock,
      });
      fetchMock.mockResolvedValueOnce(jsonResponse({ results: [] }));

      const result = await custom.queryDatabase("seeds");

      expect(call(0).url).toBe("http://localhost:9999/v1/databases/seeds/query");
      expect(call(0).init?.headers).toMatchObject({ "Notion-Version": "2021-05-13" });
      expect(result).toEqual({ results: [], hasMore: false, nextCursor: null });
    });
  });
});

import { z } from "zod";
import type { Block, PageRecord, PropertyValue } from "@seedling/shared";

// Response shapes of the Notion REST API, reduced to the fields read here.

const richTextSchema = z.object({
  plain_text: z.string().optional(),
  text: z.object({ content: z.string() }).nullish(),
});

const propertySchema = z
  .object({
    type: z.string().optional(),
    title: z.array(richTextSchema).optional(),
    rich_text: z.array(richTextSchema).optional(),
    relation: z.array(z.object({ id: z.string() })).optional(),
  })
  .passthrough();

const parentSchema = z
  .object({
    type: z.string().optional(),
    database_id: z.string().optional(),
  })
  .passthrough();

export const pageSchema = z.object({
  id: z.string(),
  parent: parentSchema.optional(),
  properties: z.record(propertySchema).default({}),
});

const codeSchema = z.object({
  rich_text: z.array(richTextSchema).optional(),
  // Pre-2022 API versions name the same field "text"
  text: z.array(richTextSchema).optional(),
  language: z.string().optional(),
});

export const blockSchema = z.object({
  id: z.string(),
  type: z.string(),
  code: codeSchema.optional(),
});

export function listSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    results: z.array(item),
    has_more: z.boolean().default(false),
    next_cursor: z.string().nullish(),
  });
}

type RichText = z.infer<typeof richTextSchema>;

export function joinRichText(segments: RichText[]): string {
  return segments
    .map((s) => s.text?.content ?? s.plain_text ?? "")
    .join("");
}

function toPropertyValue(raw: z.infer<typeof propertySchema>): PropertyValue {
  if (raw.title) return { kind: "text", value: joinRichText(raw.title) };
  if (raw.rich_text) return { kind: "text", value: joinRichText(raw.rich_text) };
  if (raw.relation) return { kind: "relation", ids: raw.relation.map((r) => r.id) };
  return { kind: "other", type: raw.type ?? "unknown" };
}

export function toPageRecord(raw: z.infer<typeof pageSchema>): PageRecord {
  const properties: Record<string, PropertyValue> = {};
  for (const [name, value] of Object.entries(raw.properties)) {
    properties[name] = toPropertyValue(value);
  }
  return {
    id: raw.id,
    parentDatabaseId: raw.parent?.database_id,
    properties,
  };
}

export function toBlock(raw: z.infer<typeof blockSchema>): Block {
  if (raw.type !== "code") {
    return { id: raw.id, type: raw.type, kind: "other", text: "" };
  }
  const segments = raw.code?.rich_text ?? raw.code?.text ?? [];
  return {
    id: raw.id,
    type: raw.type,
    kind: "code",
    text: joinRichText(segments),
    language: raw.code?.language,
  };
}

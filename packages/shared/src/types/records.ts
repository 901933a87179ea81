// Block kinds other than "code" are carried as "other"; only code is inspected.
export interface CodeBlock {
  kind: "code" | "other";
  text: string;
  language?: string;
}

// A block as returned by the store, already reduced to what the pipeline reads
export interface Block extends CodeBlock {
  id: string;
  type: string; // raw store type, e.g. "code", "paragraph"
}

export interface RichTextProperty {
  kind: "text";
  value: string;
}

export interface RelationProperty {
  kind: "relation";
  ids: string[];
}

export interface OtherProperty {
  kind: "other";
  type: string;
}

export type PropertyValue = RichTextProperty | RelationProperty | OtherProperty;

export interface PageRecord {
  id: string;
  parentDatabaseId?: string;
  properties: Record<string, PropertyValue>;
}

// Filter shape for name search
export interface TitleFilter {
  property: string;
  matchKind: "contains" | "equals";
  value: string;
}

export interface DatabaseQuery {
  filter?: TitleFilter;
  startCursor?: string;
  pageSize?: number;
}

export interface QueryResult<T> {
  results: T[];
  hasMore: boolean;
  nextCursor: string | null;
}

/**
 * The remote document store, as consumed by the pipeline.
 * Implementations own transport, auth and any timeout policy.
 */
export interface RecordStore {
  getPage(pageId: string): Promise<PageRecord>;
  getChildren(blockId: string): Promise<Block[]>;
  queryDatabase(databaseId: string, query?: DatabaseQuery): Promise<QueryResult<PageRecord>>;
}

export interface Seed {
  id: string;
  name: string;
  modules: string[]; // relation ids, store order
  command?: string;
}

export interface SeedSummary {
  name: string;
  id: string;
}

export interface ModuleRecord {
  id: string;
  filename: string;
  subPath?: string;
  parentDatabaseId?: string;
  codeBlocks: CodeBlock[];
}

// Names of the page properties the pipeline reads
export interface PropertyNames {
  title: string;
  path: string;
  modules: string;
  command: string;
}

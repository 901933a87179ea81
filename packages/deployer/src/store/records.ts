import { MalformedRecord } from "@seedling/shared";
import type {
  Block,
  ModuleRecord,
  PageRecord,
  PropertyNames,
  Seed,
  SeedSummary,
} from "@seedling/shared";

export const DEFAULT_PROPERTY_NAMES: PropertyNames = {
  title: "Reference",
  path: "Path",
  modules: "Modules",
  command: "Command",
};

const UNTITLED_SEED = "Untitled Seed";

export function readText(page: PageRecord, property: string): string | undefined {
  const value = page.properties[property];
  if (!value || value.kind !== "text") return undefined;
  return value.value;
}

export function readRelation(page: PageRecord, property: string): string[] {
  const value = page.properties[property];
  if (!value || value.kind !== "relation") return [];
  return value.ids;
}

/** Trimmed title, or undefined when the property is missing or blank. */
export function readTitle(page: PageRecord, names: PropertyNames): string | undefined {
  const title = readText(page, names.title)?.trim();
  return title ? title : undefined;
}

export function toSeed(page: PageRecord, names: PropertyNames): Seed {
  const command = readText(page, names.command);
  return {
    id: page.id,
    name: readTitle(page, names) ?? UNTITLED_SEED,
    modules: readRelation(page, names.modules),
    command: command && command.trim() ? command : undefined,
  };
}

export function toSeedSummary(page: PageRecord, names: PropertyNames): SeedSummary {
  return { name: readTitle(page, names) ?? UNTITLED_SEED, id: page.id };
}

export function toModuleRecord(
  page: PageRecord,
  blocks: Block[],
  names: PropertyNames,
): ModuleRecord {
  const filename = readTitle(page, names);
  if (!filename) {
    throw new MalformedRecord(
      `Module ${page.id} has no ${names.title} title`,
      page.id,
    );
  }
  const subPath = readText(page, names.path)?.trim();
  return {
    id: page.id,
    filename,
    subPath: subPath ? subPath : undefined,
    parentDatabaseId: page.parentDatabaseId,
    codeBlocks: blocks.map(({ kind, text, language }) => ({ kind, text, language })),
  };
}

import { createLogger } from "@seedling/shared";
import type { PropertyNames, RecordStore, Seed, SeedSummary } from "@seedling/shared";
import { collectPages } from "../store/paginate.js";
import { DEFAULT_PROPERTY_NAMES, readTitle, toSeed, toSeedSummary } from "../store/records.js";

export interface SeedResolverOptions {
  store: RecordStore;
  seedDatabaseId: string;
  properties?: PropertyNames;
}

export interface SeedMatch {
  seed: Seed;
  // Number of seeds the store returned for the query
  matches: number;
}

/**
 * SeedResolver looks seeds up in the seed database. Name lookup is a
 * substring search where the first result the store returns wins.
 */
export class SeedResolver {
  private logger = createLogger("seed-resolver");
  private options: SeedResolverOptions;
  private names: PropertyNames;

  constructor(options: SeedResolverOptions) {
    this.options = options;
    this.names = options.properties ?? DEFAULT_PROPERTY_NAMES;
  }

  async findByName(name: string): Promise<Seed | undefined> {
    return (await this.match(name, false))?.seed;
  }

  // Title must equal `name` exactly (after trimming)
  async findExact(name: string): Promise<Seed | undefined> {
    return (await this.match(name, true))?.seed;
  }

  async match(name: string, exact: boolean): Promise<SeedMatch | undefined> {
    const value = exact ? name.trim() : name;
    const result = await this.options.store.queryDatabase(this.options.seedDatabaseId, {
      filter: {
        property: this.names.title,
        matchKind: exact ? "equals" : "contains",
        value,
      },
    });

    const candidates = exact
      ? result.results.filter((page) => readTitle(page, this.names) === value)
      : result.results;

    this.logger.info(`Searching for seed '${name}'... found ${candidates.length} match(es)`);
    if (candidates.length > 1) {
      this.logger.warn(`Seed name '${name}' is ambiguous, using the first match`);
    }

    const first = candidates[0];
    if (!first) return undefined;
    return { seed: toSeed(first, this.names), matches: candidates.length };
  }

  async listAll(): Promise<SeedSummary[]> {
    const pages = await collectPages(
      (cursor) =>
        this.options.store.queryDatabase(this.options.seedDatabaseId, {
          startCursor: cursor,
        }),
      `seed database ${this.options.seedDatabaseId}`,
    );
    this.logger.debug(`Listed ${pages.length} seeds`);
    return pages.map((page) => toSeedSummary(page, this.names));
  }
}

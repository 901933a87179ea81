import type { Config, RecordStore } from '@seedling/shared';
import { SeedResolver } from '@seedling/deployer';
import { createStore } from '../context.js';

export async function listCommand(
  config: Config,
  options: { store?: RecordStore; print?: (line: string) => void } = {},
): Promise<number> {
  const print = options.print ?? console.log;
  const resolver = new SeedResolver({
    store: options.store ?? createStore(config),
    seedDatabaseId: config.notion.seedDatabaseId,
    properties: config.properties,
  });

  const seeds = await resolver.listAll();
  if (seeds.length === 0) {
    print('No seeds found.');
    return 0;
  }
  const width = Math.max(...seeds.map((s) => s.name.length));
  for (const seed of seeds) {
    print(`${seed.name.padEnd(width)}  ${seed.id}`);
  }
  return seeds.length;
}

import { z } from "zod";

export const configSchema = z.object({
  notion: z.object({
    apiKey: z.string().min(1),
    seedDatabaseId: z.string().min(1),
    moduleDatabaseId: z.string().min(1),
    apiVersion: z.string().default("2022-06-28"),
    baseUrl: z.string().url().default("https://api.notion.com/v1"),
    timeoutMs: z.number().int().positive().optional(),
  }),
  properties: z
    .object({
      title: z.string().min(1).default("Reference"),
      path: z.string().min(1).default("Path"),
      modules: z.string().min(1).default("Modules"),
      command: z.string().min(1).default("Command"),
    })
    .default({}),
  deploy: z
    .object({
      outputDir: z.string().min(1).default("."),
      runCommand: z.boolean().default(true),
      commandPolicy: z.enum(["always", "all-deployed"]).default("always"),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): Config {
  return configSchema.parse(raw);
}

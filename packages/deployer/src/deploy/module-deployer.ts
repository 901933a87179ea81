import { mkdir, writeFile } from "node:fs/promises";
import { join, relative } from "node:path";
import { createLogger, MalformedRecord } from "@seedling/shared";
import type { DeployEventHandler, PropertyNames, RecordStore } from "@seedling/shared";
import { DEFAULT_PROPERTY_NAMES, toModuleRecord } from "../store/records.js";
import { extractCode } from "./code-extractor.js";
import { normalizeSubPath } from "./path-sanitizer.js";

export interface ModuleDeployerOptions {
  store: RecordStore;
  properties?: PropertyNames;
  // When set, modules whose page lives in another database are flagged
  moduleDatabaseId?: string;
  onEvent?: DeployEventHandler;
}

export interface DeployedModule {
  moduleId: string;
  filename: string;
  // Absolute path of the written file, absent when the module had no code
  path?: string;
}

function sameDatabase(a: string, b: string): boolean {
  const norm = (id: string) => id.replace(/-/g, "").toLowerCase();
  return norm(a) === norm(b);
}

function isPlainFilename(filename: string): boolean {
  return filename !== "." && filename !== ".." && !/[/\\]/.test(filename);
}

/**
 * ModuleDeployer materializes one module page as one file under a base
 * directory: the first non-empty code block becomes the file contents.
 */
export class ModuleDeployer {
  private logger = createLogger("module-deployer");
  private options: ModuleDeployerOptions;
  private names: PropertyNames;

  constructor(options: ModuleDeployerOptions) {
    this.options = options;
    this.names = options.properties ?? DEFAULT_PROPERTY_NAMES;
  }

  async deploy(moduleId: string, baseDir: string): Promise<DeployedModule> {
    const { store, onEvent } = this.options;

    const page = await store.getPage(moduleId);
    const blocks = await store.getChildren(moduleId);
    const record = toModuleRecord(page, blocks, this.names);

    if (!isPlainFilename(record.filename)) {
      throw new MalformedRecord(
        `Module ${moduleId} filename '${record.filename}' is not a plain file name`,
        moduleId,
      );
    }

    const expected = this.options.moduleDatabaseId;
    if (expected && record.parentDatabaseId && !sameDatabase(expected, record.parentDatabaseId)) {
      this.logger.warn(`Module ${moduleId} belongs to database ${record.parentDatabaseId}`);
      onEvent?.({ type: "foreign-module", moduleId, parentDatabaseId: record.parentDatabaseId });
    }

    const rawSubPath = record.subPath ?? "";
    const subPath = normalizeSubPath(rawSubPath);
    if (subPath.escaped) {
      this.logger.warn(`Module ${record.filename}: path '${rawSubPath}' leaves the workspace, using root`);
      onEvent?.({ type: "path-escape", moduleId, rawSubPath });
    }

    const targetDir = join(baseDir, subPath.path);
    await mkdir(targetDir, { recursive: true });

    const content = extractCode(record.codeBlocks, {
      onEmptyBlock: (blockIndex) => {
        this.logger.warn(`Found empty code block in module: ${record.filename}`);
        onEvent?.({ type: "empty-code-block", moduleId, filename: record.filename, blockIndex });
      },
    });

    if (content === undefined) {
      this.logger.info(`No code found for ${record.filename}, nothing written`);
      return { moduleId, filename: record.filename };
    }

    const filePath = join(targetDir, record.filename);
    await writeFile(filePath, content, "utf-8");
    this.logger.info(`Deployed ${relative(baseDir, filePath)}`);
    return { moduleId, filename: record.filename, path: filePath };
  }
}

import { config as loadDotenv } from "dotenv";
import * as path from "node:path";

import * as cons from "../utils/console";
import { assert } from "../utils/errorHandling";
import { canonicalizePath, findFilesRecursive, joinPathParts } from "../utils/fileSystem";
import { resolveAndLoadConfig } from "./configLoader";
import { kDefaultConfig, ResolvedProjectConfig } from "./configTypes";
import { buildDocumentIndex, DocumentIndex, DocumentSource } from "./documentIndex";
import { NodeFileTree } from "./fileTree";
import { BlockIdDeclaration, DeclarationIndex, FileTree, IndexedAttribute, ResolverHost } from "./hostTypes";

export type DocsProjectLoadOptions = {
  rootDir?: string | undefined;
  configPath?: string | undefined;
};

export type DocsProjectOptions = {
  projectRoot: string;
  config?: ResolvedProjectConfig;
  configPath?: string | undefined;
  tree?: FileTree;
};

// loads .env first, then .env.local (which overrides)
function loadEnvFiles(projectDir: string): void {
  loadDotenv({ path: joinPathParts([projectDir, ".env"]) });
  loadDotenv({ path: joinPathParts([projectDir, ".env.local"]), override: true });
}

///////////////////////////////////////////////////////////////////////////////////////////////////
// a documentation project on disk: configuration, file search and the declaration index.
export class DocsProject implements ResolverHost {
  readonly projectRoot: string;
  readonly tree: FileTree;
  readonly config: ResolvedProjectConfig;
  readonly configPath: string | undefined;

  private index: DocumentIndex;
  private readDepth = 0;

  static load(options?: DocsProjectLoadOptions): DocsProject {
    const loaded = resolveAndLoadConfig(options?.configPath, options?.rootDir);
    const projectRoot = loaded?.projectDir ?? canonicalizePath(options?.rootDir ?? process.cwd());
    loadEnvFiles(projectRoot);
    return new DocsProject({
      projectRoot,
      config: loaded?.config,
      configPath: loaded?.filePath,
    });
  }

  constructor(options: DocsProjectOptions) {
    this.projectRoot = canonicalizePath(options.projectRoot);
    this.config = options.config ?? kDefaultConfig;
    this.configPath = options.configPath;
    this.tree = options.tree ?? new NodeFileTree();
    this.index = this.buildIndex();
  }

  get attributeIndex(): DeclarationIndex<IndexedAttribute> {
    return this.index.attributes;
  }

  get blockIdIndex(): DeclarationIndex<BlockIdDeclaration> {
    return this.index.blockIds;
  }

  findFilesByName(fileName: string): string[] {
    return findFilesRecursive(this.projectRoot, (name) => name === fileName, this.excludedDirNames());
  }

  findDocuments(): string[] {
    const extensions = new Set(this.config.documentExtensions.map((ext) => ext.toLowerCase()));
    return findFilesRecursive(
      this.projectRoot,
      (name) => extensions.has(path.extname(name).toLowerCase()),
      this.excludedDirNames(),
    );
  }

  runReadAction<T>(action: () => T): T {
    this.readDepth += 1;
    try {
      return action();
    } finally {
      this.readDepth -= 1;
    }
  }

  // rebuilds the declaration index from the files on disk.
  refresh(): void {
    assert(this.readDepth === 0, "Cannot refresh the project index during a read action");
    this.index = this.buildIndex();
  }

  private excludedDirNames(): ReadonlySet<string> {
    return new Set(this.config.exclude);
  }

  private buildIndex(): DocumentIndex {
    const sources: DocumentSource[] = [];
    for (const filePath of this.findDocuments()) {
      const text = this.tree.readText(filePath);
      if (text === undefined) {
        cons.warning(`Could not read ${filePath}`);
        continue;
      }
      sources.push({ path: filePath, text });
    }
    return buildDocumentIndex(sources);
  }
}

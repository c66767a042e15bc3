// the narrow interfaces the resolvers consume. the Node.js implementation lives in
// fileTree.ts / project.ts; tests and other hosts can supply their own.

// read-only view of a directory tree. paths are absolute with forward slashes.
export interface FileTree {
  parent(filePath: string): string | undefined;
  name(filePath: string): string;
  findChild(dirPath: string, childName: string): string | undefined;
  children(dirPath: string): string[];
  isDirectory(filePath: string): boolean;
  exists(filePath: string): boolean;
  readText(filePath: string): string | undefined;
}

export type SourceLocation = {
  file: string;
  line: number; // 1-based
};

export type IndexedAttribute = SourceLocation & {
  name: string;
  // undefined for unset entries such as ":name!:"
  value: string | undefined;
};

export type BlockIdDeclaration = SourceLocation & {
  id: string;
};

// key -> declarations multimap, already limited to the project scope.
export interface DeclarationIndex<T> {
  get(key: string): readonly T[];
  keys(): string[];
}

export interface ResolverHost {
  readonly projectRoot: string;
  readonly tree: FileTree;
  readonly attributeIndex: DeclarationIndex<IndexedAttribute>;
  readonly blockIdIndex: DeclarationIndex<BlockIdDeclaration>;

  // every file with the exact name, outside excluded directories, sorted by path.
  findFilesByName(fileName: string): string[];

  // runs the action as one read transaction over the tree and the indices.
  runReadAction<T>(action: () => T): T;
}

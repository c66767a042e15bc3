import * as path from "node:path";

import {
  canonicalizePath,
  fileExists,
  isDirectory,
  joinPathParts,
  readDirectoryNames,
  readTextFileSync,
} from "../utils/fileSystem";
import { FileTree } from "./hostTypes";

// FileTree over the real file system.
export class NodeFileTree implements FileTree {
  parent(filePath: string): string | undefined {
    const canonical = canonicalizePath(filePath);
    const parentPath = canonicalizePath(path.dirname(canonical));
    return parentPath === canonical ? undefined : parentPath;
  }

  name(filePath: string): string {
    return path.basename(canonicalizePath(filePath));
  }

  findChild(dirPath: string, childName: string): string | undefined {
    const childPath = joinPathParts([canonicalizePath(dirPath), childName]);
    return fileExists(childPath) ? childPath : undefined;
  }

  children(dirPath: string): string[] {
    const canonical = canonicalizePath(dirPath);
    return readDirectoryNames(canonical).map((name) => joinPathParts([canonical, name]));
  }

  isDirectory(filePath: string): boolean {
    return isDirectory(filePath);
  }

  exists(filePath: string): boolean {
    return fileExists(filePath);
  }

  readText(filePath: string): string | undefined {
    return readTextFileSync(filePath);
  }
}

import * as fs from "fs";
import * as path from "path";

export function fileExists(filePath: string): boolean {
  try {
    return fs.existsSync(filePath);
  } catch {
    return false;
  }
}

export function isAbsolutePath(p: string): boolean {
  return path.isAbsolute(p);
}

export function joinPathParts(pathParts: string[]): string {
  return toForwardSlashes(path.join(...pathParts));
}

export function isDirectory(p: string): boolean {
  try {
    const stats = fs.statSync(p);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

export function toForwardSlashes(p: string): string {
  return p.replace(/\\/g, "/");
}

// Normalizes a path to its canonical form
// (absolute, .. and . segments resolved, forward slashes, no trailing slash)
export function canonicalizePath(p: string): string {
  return toForwardSlashes(path.resolve(p));
}

export function readTextFileSync(filePath: string, encoding?: BufferEncoding): string | undefined {
  try {
    return fs.readFileSync(filePath, encoding || "utf-8");
  } catch {
    return undefined;
  }
}

export function readDirectoryNames(dirPath: string): string[] {
  try {
    return fs.readdirSync(dirPath).sort();
  } catch {
    return [];
  }
}

// Walks dirPath recursively and returns every file accepted by the predicate, sorted.
// Directories whose name is in excludeDirNames are not entered.
export function findFilesRecursive(
  dirPath: string,
  accept: (fileName: string) => boolean,
  excludeDirNames: ReadonlySet<string>,
): string[] {
  const result: string[] = [];
  const pending = [canonicalizePath(dirPath)];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) {
      break;
    }
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(current, { withFileTypes: true });
    } catch {
      continue;
    }
    for (const entry of entries) {
      const entryPath = joinPathParts([current, entry.name]);
      if (entry.isDirectory()) {
        if (!excludeDirNames.has(entry.name)) {
          pending.push(entryPath);
        }
      } else if (entry.isFile() && accept(entry.name)) {
        result.push(entryPath);
      }
    }
  }
  return result.sort();
}

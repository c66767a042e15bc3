import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { canonicalizePath } from "../utils/fileSystem";

// helpers for tests that lay out documentation projects in temporary directories.

export function makeTempDir(name: string): string {
  return canonicalizePath(fs.mkdtempSync(path.join(os.tmpdir(), `adocxref-${name}-`)));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(rootDir: string, relPath: string, content = ""): string {
  const absPath = canonicalizePath(path.join(rootDir, relPath));
  fs.mkdirSync(path.dirname(absPath), { recursive: true });
  fs.writeFileSync(absPath, content, "utf-8");
  return absPath;
}

export function makeDir(rootDir: string, relPath: string): string {
  const absPath = canonicalizePath(path.join(rootDir, relPath));
  fs.mkdirSync(absPath, { recursive: true });
  return absPath;
}

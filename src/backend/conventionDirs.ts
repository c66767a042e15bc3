import { defineEnum } from "../utils/enum";
import { FileTree } from "./hostTypes";

export const ANTORA_YML = "antora.yml";
export const MODULES_DIR_NAME = "modules";
export const ROOT_MODULE_NAME = "ROOT";

// resource families and the directories they live in, relative to a module root.
// candidate directories are tried in order.
export const kResourceFamily = defineEnum({
  example: {
    value: "example",
    candidateDirs: [["examples"]],
  },
  attachment: {
    value: "attachment",
    candidateDirs: [["assets", "attachments"], ["attachments"]],
  },
  partial: {
    value: "partial",
    candidateDirs: [["partials"], ["pages", "_partials"]],
  },
  image: {
    value: "image",
    candidateDirs: [["assets", "images"], ["images"]],
  },
  page: {
    value: "page",
    candidateDirs: [["pages"]],
  },
} as const);

export type ResourceFamilyKey = typeof kResourceFamily.$key;

// a module root is a directory inside "modules" whose parent holds the component descriptor.
export function isModuleRoot(tree: FileTree, dir: string): boolean {
  const modulesDir = tree.parent(dir);
  if (modulesDir === undefined || tree.name(modulesDir) !== MODULES_DIR_NAME) {
    return false;
  }
  const componentDir = tree.parent(modulesDir);
  return componentDir !== undefined && tree.findChild(componentDir, ANTORA_YML) !== undefined;
}

// Walks up from startDir, calling visit for every directory until it returns a value.
// depth counts the levels walked so far. Stops after checking projectRoot.
function walkUp<T>(
  tree: FileTree,
  projectRoot: string,
  startDir: string,
  visit: (dir: string, depth: number) => T | undefined,
): T | undefined {
  let dir: string | undefined = startDir;
  let depth = 0;
  while (dir !== undefined) {
    const result = visit(dir, depth);
    if (result !== undefined) {
      return result;
    }
    if (dir === projectRoot) {
      break;
    }
    dir = tree.parent(dir);
    depth += 1;
  }
  return undefined;
}

type ConventionMatch = {
  dir: string;
  // path of dir relative to the module root, e.g. "assets/images"
  subPath: string;
};

function findFamilyDirInModule(tree: FileTree, moduleRoot: string, family: ResourceFamilyKey): ConventionMatch | undefined {
  const candidates: ReadonlyArray<ReadonlyArray<string>> = kResourceFamily.byKey[family].candidateDirs;
  for (const segments of candidates) {
    let current: string | undefined = moduleRoot;
    for (const segment of segments) {
      current = current === undefined ? undefined : tree.findChild(current, segment);
    }
    if (current !== undefined && tree.isDirectory(current)) {
      return { dir: current, subPath: segments.join("/") };
    }
  }
  return undefined;
}

export function findModuleRoot(tree: FileTree, projectRoot: string, startDir: string): string | undefined {
  return walkUp(tree, projectRoot, startDir, (dir) => (isModuleRoot(tree, dir) ? dir : undefined));
}

// finds the directory of a resource family in the closest enclosing module.
// a module root without that directory does not stop the walk.
export function findConventionDir(
  tree: FileTree,
  projectRoot: string,
  startDir: string,
  family: ResourceFamilyKey,
): string | undefined {
  return walkUp(tree, projectRoot, startDir, (dir) =>
    isModuleRoot(tree, dir) ? findFamilyDirInModule(tree, dir, family)?.dir : undefined,
  );
}

// same directory as findConventionDir, relative to startDir ("../../assets/images").
export function findConventionDirRelative(
  tree: FileTree,
  projectRoot: string,
  startDir: string,
  family: ResourceFamilyKey,
): string | undefined {
  return walkUp(tree, projectRoot, startDir, (dir, depth) => {
    if (!isModuleRoot(tree, dir)) {
      return undefined;
    }
    const match = findFamilyDirInModule(tree, dir, family);
    return match ? "../".repeat(depth) + match.subPath : undefined;
  });
}

// build-tool output directory holding generated documentation snippets
// (maven "target/generated-snippets", gradle "build/generated-snippets").
const SNIPPET_LAYOUTS = [
  { buildFile: "pom.xml", outputDir: "target" },
  { buildFile: "build.gradle", outputDir: "build" },
  { buildFile: "build.gradle.kts", outputDir: "build" },
];

export function findBuildSnippetsDir(tree: FileTree, projectRoot: string, startDir: string): string | undefined {
  return walkUp(tree, projectRoot, startDir, (dir) => {
    for (const layout of SNIPPET_LAYOUTS) {
      if (tree.findChild(dir, layout.buildFile) === undefined) {
        continue;
      }
      const outputDir = tree.findChild(dir, layout.outputDir);
      const snippets = outputDir === undefined ? undefined : tree.findChild(outputDir, "generated-snippets");
      if (snippets !== undefined) {
        return snippets;
      }
    }
    return undefined;
  });
}

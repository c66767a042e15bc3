import { parse as parseYaml } from "yaml";

import { countSameStartingCharacters, distinctBy } from "../utils/algorithms";
import * as cons from "../utils/console";
import { err, ok, Result } from "../utils/errorHandling";
import { ANTORA_YML, MODULES_DIR_NAME, ROOT_MODULE_NAME } from "./conventionDirs";
import { FileTree, ResolverHost } from "./hostTypes";

// "module:" - module directory names must form a valid prefix.
export const MODULE_PREFIX_PATTERN = /^[a-zA-Z0-9._-]*:$/;

// scalars meaning "no value" (every scalar is read as a string)
const kNullScalars = new Set(["", "~", "null", "Null", "NULL"]);

export type DescriptorData = {
  name: string | undefined;
  version: string | undefined;
  title: string | undefined;
  // asciidoc.attributes
  attributes: Record<string, string>;
};

export type ModuleEntry = {
  name: string;
  dir: string;
};

export type ModuleDescriptor = DescriptorData & {
  descriptorFile: string;
  componentDir: string;
  modulesDir: string | undefined;
  modules: ModuleEntry[];
};

export type AntoraModule = {
  prefix: string;
  componentName: string | undefined;
  moduleName: string;
  title: string | undefined;
  moduleDir: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalarAsString(value: unknown): string | undefined {
  if (typeof value !== "string" || kNullScalars.has(value)) {
    return undefined;
  }
  return value;
}

// "false" and null unset an attribute; a trailing "@" only marks a soft set.
function readAttributes(asciidoc: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(asciidoc) || !isRecord(asciidoc.attributes)) {
    return result;
  }
  for (const [name, raw] of Object.entries(asciidoc.attributes)) {
    const value = scalarAsString(raw);
    if (value === undefined || value === "false") {
      continue;
    }
    result[name.toLowerCase()] = value.endsWith("@") ? value.slice(0, -1) : value;
  }
  return result;
}

// every scalar stays a string so versions such as "1.0" keep their spelling.
export function parseDescriptorText(text: string): Result<DescriptorData> {
  let parsed: unknown;
  try {
    parsed = parseYaml(text, { schema: "failsafe" });
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
  if (parsed === null || parsed === undefined) {
    // empty file
    parsed = {};
  }
  if (!isRecord(parsed)) {
    return err("descriptor is not a mapping");
  }
  return ok({
    name: scalarAsString(parsed.name),
    version: scalarAsString(parsed.version),
    title: scalarAsString(parsed.title),
    attributes: readAttributes(parsed.asciidoc),
  });
}

function listModules(tree: FileTree, modulesDir: string | undefined): ModuleEntry[] {
  if (modulesDir === undefined) {
    return [];
  }
  return tree
    .children(modulesDir)
    .filter((dir) => tree.isDirectory(dir) && MODULE_PREFIX_PATTERN.test(`${tree.name(dir)}:`))
    .map((dir) => ({ name: tree.name(dir), dir }));
}

// a malformed descriptor still names its modules, but no component, version or title.
export function readDescriptor(tree: FileTree, descriptorFile: string): ModuleDescriptor | undefined {
  const componentDir = tree.parent(descriptorFile);
  if (componentDir === undefined) {
    return undefined;
  }
  const parsed = parseDescriptorText(tree.readText(descriptorFile) ?? "");
  if (!parsed.ok) {
    cons.dim(`Ignoring malformed ${descriptorFile}: ${parsed.error}`);
  }
  const data: DescriptorData = parsed.ok
    ? parsed.value
    : { name: undefined, version: undefined, title: undefined, attributes: {} };
  const modulesDir = tree.findChild(componentDir, MODULES_DIR_NAME);
  return {
    ...data,
    descriptorFile,
    componentDir,
    modulesDir,
    modules: listModules(tree, modulesDir),
  };
}

export function findAllDescriptors(host: ResolverHost): ModuleDescriptor[] {
  return host.runReadAction(() =>
    host
      .findFilesByName(ANTORA_YML)
      .map((file) => readDescriptor(host.tree, file))
      .filter((descriptor): descriptor is ModuleDescriptor => descriptor !== undefined),
  );
}

// the descriptor of the component a module directory belongs to.
export function readAnchorDescriptor(tree: FileTree, moduleDir: string): ModuleDescriptor | undefined {
  const modulesDir = tree.parent(moduleDir);
  const componentDir = modulesDir === undefined ? undefined : tree.parent(modulesDir);
  const descriptorFile = componentDir === undefined ? undefined : tree.findChild(componentDir, ANTORA_YML);
  return descriptorFile === undefined ? undefined : readDescriptor(tree, descriptorFile);
}

// closest first: longest literal common prefix between descriptor file and dir. stable.
export function sortByProximity(descriptors: readonly ModuleDescriptor[], dir: string): ModuleDescriptor[] {
  return descriptors
    .map((descriptor) => ({ descriptor, score: countSameStartingCharacters(descriptor.descriptorFile, dir) }))
    .sort((a, b) => b.score - a.score)
    .map((entry) => entry.descriptor);
}

// every prefix under which a module can be addressed from moduleDir, closest component first:
//   "<v@>module:"            modules of the same component
//   "<v@>component::"        ROOT modules
//   "<v@>component:module:"  every module
// "v@" only appears when the version differs from moduleDir's component version.
export function collectPrefixes(host: ResolverHost, moduleDir: string): AntoraModule[] {
  return host.runReadAction(() => {
    const anchor = readAnchorDescriptor(host.tree, moduleDir);
    if (!anchor) {
      return [];
    }
    const candidates: AntoraModule[] = [];
    const componentTitles = new Map<string | undefined, string>();

    for (const descriptor of sortByProximity(findAllDescriptors(host), moduleDir)) {
      const componentName = descriptor.name;
      if (descriptor.title !== undefined && !componentTitles.has(componentName)) {
        componentTitles.set(componentName, descriptor.title);
      }
      const versionPrefix = descriptor.version === anchor.version ? "" : `${descriptor.version ?? ""}@`;
      const component = componentName ?? "";

      for (const module of descriptor.modules) {
        const entry = { componentName, moduleName: module.name, title: descriptor.title, moduleDir: module.dir };
        if (componentName === anchor.name) {
          candidates.push({ ...entry, prefix: `${versionPrefix}${module.name}:` });
        }
        if (module.name === ROOT_MODULE_NAME) {
          candidates.push({ ...entry, prefix: `${versionPrefix}${component}::` });
        }
        candidates.push({ ...entry, prefix: `${versionPrefix}${component}:${module.name}:` });
      }
    }

    // the title might only be declared in some versions of a component
    return distinctBy(candidates, (candidate) => candidate.prefix).map((candidate) => ({
      ...candidate,
      title: candidate.title ?? componentTitles.get(candidate.componentName),
    }));
  });
}

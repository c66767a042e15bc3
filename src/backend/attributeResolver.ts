import { toForwardSlashes } from "../utils/fileSystem";
import { kDefaultConfig } from "./configTypes";
import { findBuildSnippetsDir, findConventionDir, findModuleRoot } from "./conventionDirs";
import { ResolverHost } from "./hostTypes";
import { readAnchorDescriptor } from "./moduleDescriptors";

export const ATTRIBUTE_REFERENCE_PATTERN = /\{([a-zA-Z0-9_][a-zA-Z0-9_-]*)\}/g;

export const SNIPPETS_ATTRIBUTE = "snippets";

export type AttributeDeclaration =
  | { kind: "indexed"; name: string; value: string | undefined; file: string; line: number }
  | { kind: "directory"; name: string; value: string }
  | { kind: "metadata"; name: string; value: string };

export type ExpandAttributesOptions = {
  // upper bound on substitutions; attributes referring to each other in a cycle hit it
  maxSubstitutions?: number;
};

function contextDir(host: ResolverHost, contextFile: string): string | undefined {
  return host.tree.parent(contextFile);
}

function snippetsDeclaration(host: ResolverHost, contextFile: string): AttributeDeclaration | undefined {
  const dir = contextDir(host, contextFile);
  const snippets = dir === undefined ? undefined : findBuildSnippetsDir(host.tree, host.projectRoot, dir);
  return snippets === undefined ? undefined : { kind: "directory", name: SNIPPETS_ATTRIBUTE, value: toForwardSlashes(snippets) };
}

// attributes the enclosing module defines without any declaration in the documents:
// family directories (imagesdir, partialsdir, ...), page-* metadata and asciidoc.attributes of antora.yml.
export function moduleAttributes(host: ResolverHost, contextFile: string): AttributeDeclaration[] {
  const dir = contextDir(host, contextFile);
  const moduleDir = dir === undefined ? undefined : findModuleRoot(host.tree, host.projectRoot, dir);
  if (dir === undefined || moduleDir === undefined) {
    return [];
  }
  const result: AttributeDeclaration[] = [];
  for (const family of ["partial", "image", "attachment", "example"] as const) {
    const familyDir = findConventionDir(host.tree, host.projectRoot, dir, family);
    if (familyDir !== undefined) {
      result.push({ kind: "directory", name: `${family}sdir`, value: toForwardSlashes(familyDir) });
    }
  }

  const descriptor = readAnchorDescriptor(host.tree, moduleDir);
  if (!descriptor) {
    return result;
  }
  const metadata: [string, string | undefined][] = [
    ["page-component-name", descriptor.name],
    ["page-component-version", descriptor.version],
    ["page-component-title", descriptor.title],
    ["page-module", host.tree.name(moduleDir)],
    ...Object.entries(descriptor.attributes),
  ];
  for (const [name, value] of metadata) {
    if (value !== undefined) {
      result.push({ kind: "metadata", name, value });
    }
  }
  return result;
}

// Declarations of one attribute as seen from contextFile. Attributes the module defines
// hide the declarations found in the documents.
export function findAttributeDeclarations(host: ResolverHost, name: string, contextFile: string): AttributeDeclaration[] {
  const key = name.toLowerCase();
  return host.runReadAction((): AttributeDeclaration[] => {
    const result: AttributeDeclaration[] = [];
    if (key === SNIPPETS_ATTRIBUTE) {
      const snippets = snippetsDeclaration(host, contextFile);
      if (snippets) {
        result.push(snippets);
      }
    }
    result.push(...moduleAttributes(host, contextFile).filter((declaration) => declaration.name === key));
    if (result.length > 0) {
      return result;
    }
    return host.attributeIndex.get(key).map((declaration) => ({ kind: "indexed" as const, ...declaration }));
  });
}

export function collectAttributeDeclarations(host: ResolverHost, contextFile: string): AttributeDeclaration[] {
  return host.runReadAction(() => {
    const result: AttributeDeclaration[] = host.attributeIndex
      .keys()
      .flatMap((key) => host.attributeIndex.get(key).map((declaration) => ({ kind: "indexed" as const, ...declaration })));
    const snippets = snippetsDeclaration(host, contextFile);
    if (snippets) {
      result.push(snippets);
    }
    result.push(...moduleAttributes(host, contextFile));
    return result;
  });
}

// Replaces {name} references with their values, resolving references inside values as well.
// Returns undefined when a name has conflicting values or after maxSubstitutions replacements.
// Names without any declaration stay in the text as they are.
export function expandAttributes(
  host: ResolverHost,
  contextFile: string,
  text: string,
  options?: ExpandAttributesOptions,
): string | undefined {
  const maxSubstitutions = options?.maxSubstitutions ?? kDefaultConfig.maxAttributeSubstitutions;
  const pattern = new RegExp(ATTRIBUTE_REFERENCE_PATTERN.source, "g");

  return host.runReadAction(() => {
    let result = text;
    let substitutions = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(result)) !== null) {
      const values = new Set(findAttributeDeclarations(host, match[1], contextFile).map((d) => d.value));
      if (values.size > 1) {
        return undefined;
      }
      const [value] = values;
      if (value === undefined) {
        continue;
      }
      substitutions += 1;
      if (substitutions > maxSubstitutions) {
        return undefined;
      }
      result = result.substring(0, match.index) + value + result.substring(match.index + match[0].length);
      // the value may hold references itself, or complete one that starts earlier
      pattern.lastIndex = 0;
    }
    return result;
  });
}

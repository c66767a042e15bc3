import { canonicalizePath, isAbsolutePath, joinPathParts } from "../utils/fileSystem";
import { tokenize } from "./asciidocLexer";
import { expandAttributes } from "./attributeResolver";
import { ResourceFamilyKey } from "./conventionDirs";
import { makeLineLookup } from "./documentIndex";
import { DocsProject } from "./project";
import { isUrl, parseSymbolicKey, resolveSymbolicKeyFromFile } from "./xrefResolver";

// block macros whose target names a resource, with the family a bare target belongs to.
const kReferenceMacros: ReadonlyMap<string, ResourceFamilyKey | undefined> = new Map<string, ResourceFamilyKey | undefined>([
  ["image", "image"],
  ["video", "image"],
  ["audio", "image"],
  ["include", undefined],
]);

export type ReferenceStatus = "resolved" | "missing" | "ambiguous";

export type ReferenceCheckResult = {
  file: string;
  line: number;
  macro: string;
  target: string;
  status: ReferenceStatus;
  candidates: string[];
};

function resolveTarget(project: DocsProject, file: string, target: string, defaultFamily: ResourceFamilyKey | undefined): string[] {
  if (isAbsolutePath(target)) {
    return [canonicalizePath(target)];
  }
  const family = parseSymbolicKey(target).family ?? defaultFamily;
  if (family !== undefined) {
    const candidates = resolveSymbolicKeyFromFile(project, file, target, defaultFamily).filter(isAbsolutePath);
    if (candidates.length > 0) {
      return candidates;
    }
  }
  const fileDir = project.tree.parent(file);
  return fileDir === undefined ? [target] : [canonicalizePath(joinPathParts([fileDir, target]))];
}

export function checkDocumentReferences(project: DocsProject, file: string, text: string): ReferenceCheckResult[] {
  const tokens = tokenize(text);
  const lineOf = makeLineLookup(text);
  const results: ReferenceCheckResult[] = [];

  tokens.forEach((token, i) => {
    const body = tokens[i + 1];
    if (token.kind !== "BLOCK_MACRO_ID" || body?.kind !== "BLOCK_MACRO_BODY") {
      return;
    }
    const macro = token.text.slice(0, -"::".length);
    if (!kReferenceMacros.has(macro)) {
      return;
    }
    const line = lineOf(token.span.start);
    const target = body.text;
    const expanded = expandAttributes(project, file, target, {
      maxSubstitutions: project.config.maxAttributeSubstitutions,
    });
    if (expanded === undefined) {
      results.push({ file, line, macro, target, status: "ambiguous", candidates: [] });
      return;
    }
    if (isUrl(expanded)) {
      return;
    }
    const candidates = resolveTarget(project, file, expanded, kReferenceMacros.get(macro));
    const found = candidates.some((candidate) => project.tree.exists(candidate));
    results.push({ file, line, macro, target, status: found ? "resolved" : "missing", candidates });
  });
  return results;
}

// every resource reference of every document in the project, in file order.
export function checkProjectReferences(project: DocsProject): ReferenceCheckResult[] {
  return project.runReadAction(() =>
    project.findDocuments().flatMap((file) => {
      const text = project.tree.readText(file);
      return text === undefined ? [] : checkDocumentReferences(project, file, text);
    }),
  );
}

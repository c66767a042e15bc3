import { findModuleRoot } from "../backend/conventionDirs";
import { collectPrefixes } from "../backend/moduleDescriptors";
import { resolveSymbolicKeyFromFile } from "../backend/xrefResolver";
import * as cons from "../utils/console";
import { CommandLineOptions, parseFamilyOption } from "./parseOptions";
import { loadProjectForCommand, resolveFileArgument } from "./core";

export async function resolveCommand(filePath: string, key: string, options?: CommandLineOptions): Promise<void> {
  const project = loadProjectForCommand(options);
  const file = resolveFileArgument(filePath);
  const candidates = resolveSymbolicKeyFromFile(project, file, key, parseFamilyOption(options?.family));

  cons.h1(`Candidates for ${key}:`);
  for (const candidate of candidates) {
    const marker = project.tree.exists(candidate) ? "+" : "-";
    cons.output(`${marker} ${candidate}`);
  }
}

export async function prefixesCommand(filePath: string, options?: CommandLineOptions): Promise<void> {
  const project = loadProjectForCommand(options);
  const file = resolveFileArgument(filePath);
  const fileDir = project.tree.parent(file);
  const moduleDir = fileDir === undefined ? undefined : findModuleRoot(project.tree, project.projectRoot, fileDir);
  if (moduleDir === undefined) {
    cons.warning(`${file} is not inside a module`);
    return;
  }

  const modules = collectPrefixes(project, moduleDir);
  cons.h1(`${modules.length} prefix(es) from ${moduleDir}:`);
  for (const module of modules) {
    const title = module.title ? ` (${module.title})` : "";
    cons.output(`${module.prefix}\t${module.moduleDir}${title}`);
  }
}

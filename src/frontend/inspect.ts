import { findIds } from "../backend/documentIndex";
import { findAllDescriptors } from "../backend/moduleDescriptors";
import * as cons from "../utils/console";
import { CommandLineOptions } from "./parseOptions";
import { loadProjectForCommand } from "./core";

export async function descriptorsCommand(options?: CommandLineOptions): Promise<void> {
  const project = loadProjectForCommand(options);
  const descriptors = findAllDescriptors(project);
  if (descriptors.length === 0) {
    cons.warning("No antora.yml found.");
    return;
  }
  for (const descriptor of descriptors) {
    cons.h1(descriptor.descriptorFile);
    cons.output(`  name:    ${descriptor.name ?? "(none)"}`);
    cons.output(`  version: ${descriptor.version ?? "(none)"}`);
    if (descriptor.title !== undefined) {
      cons.output(`  title:   ${descriptor.title}`);
    }
    cons.output(`  modules: ${descriptor.modules.map((m) => m.name).join(", ")}`);
  }
}

// with an id: where it is declared. without: every declared id.
export async function idsCommand(id?: string, options?: CommandLineOptions): Promise<void> {
  const project = loadProjectForCommand(options);
  if (id === undefined) {
    for (const key of project.blockIdIndex.keys()) {
      cons.output(key);
    }
    return;
  }
  const declarations = findIds(project, id);
  if (declarations.length === 0) {
    cons.warning(`No block id "${id}"`);
    return;
  }
  for (const declaration of declarations) {
    cons.output(`${declaration.file}:${declaration.line}`);
  }
}

import { AttributeDeclaration, collectAttributeDeclarations, expandAttributes } from "../backend/attributeResolver";
import * as cons from "../utils/console";
import { CommandLineOptions } from "./parseOptions";
import { loadProjectForCommand, resolveFileArgument } from "./core";

export function formatDeclaration(declaration: AttributeDeclaration): string {
  const value = declaration.value ?? "(unset)";
  switch (declaration.kind) {
    case "indexed":
      return `${declaration.name} = ${value}\t${declaration.file}:${declaration.line}`;
    case "directory":
      return `${declaration.name} = ${value}\t(module directory)`;
    case "metadata":
      return `${declaration.name} = ${value}\t(antora.yml)`;
  }
}

// with text: expands it as seen from the file. without: lists every attribute visible there.
export async function attrsCommand(filePath: string, text?: string, options?: CommandLineOptions): Promise<void> {
  const project = loadProjectForCommand(options);
  const file = resolveFileArgument(filePath);

  if (text !== undefined) {
    const expanded = expandAttributes(project, file, text, {
      maxSubstitutions: project.config.maxAttributeSubstitutions,
    });
    if (expanded === undefined) {
      throw new Error(`Could not expand "${text}": an attribute has conflicting values or refers to itself`);
    }
    cons.output(expanded);
    return;
  }

  const declarations = collectAttributeDeclarations(project, file);
  cons.h1(`${declarations.length} attribute declaration(s):`);
  for (const declaration of declarations) {
    cons.output(formatDeclaration(declaration));
  }
}

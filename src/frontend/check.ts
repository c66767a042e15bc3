import { DocsProject } from "../backend/project";
import { checkProjectReferences, ReferenceCheckResult } from "../backend/referenceChecker";
import * as cons from "../utils/console";
import { CommandLineOptions } from "./parseOptions";
import { loadProjectForCommand } from "./core";
import { watchProject } from "./watch";

// one line per problem, with the file relative to the project root.
export function formatProblem(result: ReferenceCheckResult, projectRoot: string): string {
  const file = result.file.startsWith(`${projectRoot}/`) ? result.file.substring(projectRoot.length + 1) : result.file;
  const location = `${file}:${result.line}`;
  if (result.status === "ambiguous") {
    return `${location}: ${result.macro}::${result.target}[] has an attribute with conflicting values`;
  }
  return `${location}: ${result.macro}::${result.target}[] not found (tried ${result.candidates.join(", ")})`;
}

// prints the problems and returns how many there are.
export function reportReferences(project: DocsProject): number {
  const results = checkProjectReferences(project);
  const problems = results.filter((result) => result.status !== "resolved");

  for (const problem of problems) {
    if (problem.status === "ambiguous") {
      cons.warning(formatProblem(problem, project.projectRoot));
    } else {
      cons.error(formatProblem(problem, project.projectRoot));
    }
  }

  if (problems.length === 0) {
    cons.success(`All ${results.length} reference(s) resolved.`);
  } else {
    cons.info(`${problems.length} of ${results.length} reference(s) unresolved.`);
  }
  return problems.length;
}

export async function checkCommand(options?: CommandLineOptions): Promise<void> {
  const project = loadProjectForCommand(options);
  cons.h1("Checking references...");
  const problemCount = reportReferences(project);

  if (options?.watch) {
    await watchProject(project, () => reportReferences(project));
    return;
  }
  if (problemCount > 0) {
    process.exitCode = 1;
  }
}

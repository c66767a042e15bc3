import { DocsProject } from "../backend/project";
import * as cons from "../utils/console";
import { canonicalizePath } from "../utils/fileSystem";
import { CommandLineOptions, parseProjectOptions, resolveLogFile } from "./parseOptions";

export function loadProjectForCommand(options?: CommandLineOptions): DocsProject {
  const project = DocsProject.load(parseProjectOptions(options));

  // after loading, so a log file named in .env / .env.local is picked up
  cons.setLogFile(resolveLogFile(options));

  cons.dim(`Project root: ${project.projectRoot}`);
  if (project.configPath) {
    cons.dim(`Config: ${project.configPath}`);
  }
  return project;
}

// file arguments are relative to the working directory.
export function resolveFileArgument(filePath: string): string {
  return canonicalizePath(filePath);
}

// errors end the command, not the process: print and set the exit code.
export async function runCommand(name: string, action: () => void | Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    cons.error(`${name} failed:`);
    cons.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

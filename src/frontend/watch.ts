import chokidar, { FSWatcher } from "chokidar";
import * as path from "node:path";

import { DocsProject } from "../backend/project";
import { debounce } from "../utils/algorithms";
import * as cons from "../utils/console";

// paths below one of the excluded directory names
export function isExcludedPath(filePath: string, excludeDirNames: readonly string[]): boolean {
  const segments = filePath.split(/[\\/]/);
  return segments.some((segment) => excludeDirNames.includes(segment));
}

// rebuilds the project index and calls onChange whenever a document, descriptor or resource changes.
export async function watchProject(project: DocsProject, onChange: () => void): Promise<void> {
  const recheck = debounce(() => {
    cons.info("\n" + "=".repeat(60));
    try {
      project.refresh();
      onChange();
    } catch (error) {
      cons.error("Check failed:");
      cons.error(error instanceof Error ? error.message : String(error));
    }
    cons.info("\nWatching for changes... (press Ctrl+C to stop)");
  }, 200);

  const watcher: FSWatcher = chokidar.watch(project.projectRoot, {
    ignoreInitial: true,
    ignored: (watchedPath: string) => isExcludedPath(path.relative(project.projectRoot, watchedPath), project.config.exclude),
    awaitWriteFinish: {
      stabilityThreshold: 100,
      pollInterval: 50,
    },
  });

  watcher.on("all", (event: string, changedPath: string) => {
    cons.dim(`${event}: ${changedPath}`);
    recheck();
  });

  watcher.on("error", (error: Error) => {
    cons.error(`Watcher error: ${error}`);
  });

  cons.info("\nWatching for changes... (press Ctrl+C to stop)");

  // resolves once the watcher is closed
  await new Promise<void>((resolve) => {
    const cleanup = () => {
      cons.info("\nShutting down...");
      watcher.close().then(resolve, (error: unknown) => {
        cons.error(`Failed to close watcher: ${error instanceof Error ? error.message : String(error)}`);
        resolve();
      });
    };
    process.once("SIGINT", cleanup);
    process.once("SIGTERM", cleanup);
  });
}

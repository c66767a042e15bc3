import { kResourceFamily, ResourceFamilyKey } from "../backend/conventionDirs";
import { DocsProjectLoadOptions } from "../backend/project";
import * as cons from "../utils/console";

export const kLogFileEnvVar = "ADOCXREF_LOG_FILE";

export interface CommandLineOptions {
  root?: string;
  config?: string;
  logFile?: string;
  family?: string;
  watch?: boolean;
}

export function parseProjectOptions(cmd?: CommandLineOptions | undefined): DocsProjectLoadOptions {
  return {
    rootDir: cmd?.root,
    configPath: cmd?.config,
  };
}

// --family, checked against the known resource families.
export function parseFamilyOption(family?: string | undefined): ResourceFamilyKey | undefined {
  if (family === undefined) {
    return undefined;
  }
  const info = kResourceFamily.coerceByKey(family);
  if (!info) {
    cons.warning(`Unknown resource family: ${family} (expected one of ${kResourceFamily.keys.join(", ")})`);
    return undefined;
  }
  return info.key;
}

// --log-file wins over the environment (which .env files may have filled in).
export function resolveLogFile(cmd?: CommandLineOptions | undefined, env: NodeJS.ProcessEnv = process.env): string | null {
  return cmd?.logFile ?? env[kLogFileEnvVar] ?? null;
}

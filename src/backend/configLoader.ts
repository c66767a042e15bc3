import Ajv from "ajv";
import * as fs from "fs";
import { parse as parseJsonc, ParseError, printParseErrorCode } from "jsonc-parser";
import * as path from "path";

import configSchema from "../../adocxref.schema.json";

import { canonicalizePath } from "../utils/fileSystem";
import { applyConfigDefaults, kConfigFileNames, ProjectConfig, ResolvedProjectConfig } from "./configTypes";

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: unknown[],
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

// Finds the config file in a directory; adocxref.jsonc wins over adocxref.json.
export function findConfigInDirectory(directory: string): string | undefined {
  try {
    const files = fs.readdirSync(directory);
    const configFile = kConfigFileNames.find((name) => files.includes(name));

    if (configFile) {
      return path.join(directory, configFile);
    }

    return undefined;
  } catch (error) {
    throw new ConfigLoadError(`Failed to search directory: ${directory}`, error instanceof Error ? error : undefined);
  }
}

function validateConfig(data: unknown): ProjectConfig {
  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile<ProjectConfig>(configSchema);

  if (!validate(data)) {
    const errorMessages = validate.errors?.map((err) => `${err.instancePath} ${err.message}`) || [];

    throw new ConfigValidationError(`Config validation failed:\n${errorMessages.join("\n")}`, validate.errors || []);
  }

  return data;
}

export interface LoadedConfig {
  config: ResolvedProjectConfig;
  filePath: string;
  projectDir: string;
}

// Loads and validates a config file.
// filePath - Path to the config file
// returns the config with defaults applied; the project root is the file's directory
export function loadConfig(filePath: string): LoadedConfig {
  try {
    const fileContent = fs.readFileSync(filePath, "utf-8");

    const parseErrors: ParseError[] = [];
    const parsed: unknown = parseJsonc(fileContent, parseErrors, { allowTrailingComma: true });
    if (parseErrors.length > 0) {
      const details = parseErrors.map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`);
      throw new ConfigLoadError(`Failed to parse config file: ${filePath}\n${details.join("\n")}`);
    }

    const config = applyConfigDefaults(validateConfig(parsed));
    const projectDir = canonicalizePath(path.dirname(path.resolve(filePath)));

    return { config, filePath: canonicalizePath(filePath), projectDir };
  } catch (error) {
    if (error instanceof ConfigValidationError || error instanceof ConfigLoadError) {
      throw error;
    }

    throw new ConfigLoadError(`Unexpected error loading config: ${filePath}`, error instanceof Error ? error : undefined);
  }
}

// configPath - explicit config file; otherwise the config (if any) in rootDir or cwd.
// a project without config file gets the defaults.
export function resolveAndLoadConfig(configPath?: string, rootDir?: string): LoadedConfig | undefined {
  if (configPath) {
    return loadConfig(path.resolve(configPath));
  }
  const searchDir = path.resolve(rootDir ?? process.cwd());
  const foundPath = findConfigInDirectory(searchDir);
  return foundPath ? loadConfig(foundPath) : undefined;
}

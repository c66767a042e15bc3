import { toForwardSlashes } from "../utils/fileSystem";
import { findConventionDir, findModuleRoot, kResourceFamily, ResourceFamilyKey, ROOT_MODULE_NAME } from "./conventionDirs";
import { ResolverHost } from "./hostTypes";
import { findAllDescriptors, readAnchorDescriptor, sortByProximity } from "./moduleDescriptors";

export const URL_PREFIX_PATTERN = /^(https?|file|ftp|irc):\/\//;

// 2.0@
const VERSION_PATTERN = /^([a-zA-Z0-9._-]*)@/;
// component:module:
const COMPONENT_MODULE_PATTERN = /^([a-zA-Z0-9._-]*):([a-zA-Z0-9._-]*):/;
// module:
const MODULE_PATTERN = /^([a-zA-Z0-9._-]*):/;
// family$
const FAMILY_PATTERN = new RegExp(`^(${kResourceFamily.keys.join("|")})\\$`);

export type SymbolicKeyParts = {
  version?: string | undefined;
  component?: string | undefined;
  module?: string | undefined;
  family?: ResourceFamilyKey | undefined;
  remainder: string;
};

export function isUrl(key: string): boolean {
  return URL_PREFIX_PATTERN.test(key);
}

// consumes "version@", then "component:module:" or "module:", then "family$", left to right.
export function parseSymbolicKey(key: string): SymbolicKeyParts {
  const parts: SymbolicKeyParts = { remainder: key };

  const version = VERSION_PATTERN.exec(parts.remainder);
  if (version) {
    parts.version = version[1];
    parts.remainder = parts.remainder.substring(version[0].length);
  }

  const componentModule = COMPONENT_MODULE_PATTERN.exec(parts.remainder);
  if (componentModule) {
    parts.component = componentModule[1];
    parts.module = componentModule[2];
    parts.remainder = parts.remainder.substring(componentModule[0].length);
  } else {
    const module = MODULE_PATTERN.exec(parts.remainder);
    if (module) {
      parts.module = module[1];
      parts.remainder = parts.remainder.substring(module[0].length);
    }
  }

  const family = FAMILY_PATTERN.exec(parts.remainder);
  if (family && kResourceFamily.isValidKey(family[1])) {
    parts.family = family[1];
    parts.remainder = parts.remainder.substring(family[0].length);
  }
  return parts;
}

type ModuleTarget = {
  component: string | undefined;
  module: string;
  version: string | undefined;
};

// fills what the key leaves out from the anchor module.
function deriveTarget(
  anchor: { component: string | undefined; module: string; version: string | undefined },
  parts: SymbolicKeyParts,
): ModuleTarget {
  let component = parts.component;
  let module = parts.module;
  if (module !== undefined && component === undefined) {
    component = anchor.component;
  }
  if (component === undefined && module === undefined) {
    component = anchor.component;
    module = anchor.module;
  }
  // "@" without version text addresses the unversioned component
  let version = parts.version === "" ? undefined : parts.version;
  if (parts.version === undefined) {
    version = anchor.version;
  }
  return { component, module: module || ROOT_MODULE_NAME, version };
}

// module directories matching the key's component, module and version, closest component first.
export function findTargetModuleDirs(host: ResolverHost, anchorModuleDir: string, parts: SymbolicKeyParts): string[] {
  return host.runReadAction(() => {
    const anchor = readAnchorDescriptor(host.tree, anchorModuleDir);
    if (!anchor) {
      return [];
    }
    const target = deriveTarget(
      { component: anchor.name, module: host.tree.name(anchorModuleDir), version: anchor.version },
      parts,
    );
    // a component without name cannot be addressed
    if (target.component === undefined) {
      return [];
    }
    const result: string[] = [];
    for (const descriptor of sortByProximity(findAllDescriptors(host), anchorModuleDir)) {
      if (descriptor.name !== target.component || descriptor.version !== target.version) {
        continue;
      }
      const moduleDir = descriptor.modulesDir === undefined ? undefined : host.tree.findChild(descriptor.modulesDir, target.module);
      if (moduleDir !== undefined && host.tree.isDirectory(moduleDir)) {
        result.push(moduleDir);
      }
    }
    return result;
  });
}

// Maps a symbolic key to candidate file paths, existing files first.
// URLs, keys without a family (and no default family), and keys nothing matches come back unchanged.
export function resolveSymbolicKey(
  host: ResolverHost,
  anchorModuleDir: string,
  key: string,
  defaultFamily?: ResourceFamilyKey,
): string[] {
  if (isUrl(key)) {
    return [key];
  }
  return host.runReadAction(() => {
    if (!readAnchorDescriptor(host.tree, anchorModuleDir)) {
      return [key];
    }
    const parts = parseSymbolicKey(key);
    const family = parts.family ?? defaultFamily;
    if (family === undefined) {
      return [key];
    }

    const existing: string[] = [];
    const missing: string[] = [];
    for (const moduleDir of findTargetModuleDirs(host, anchorModuleDir, parts)) {
      const familyDir = findConventionDir(host.tree, host.projectRoot, moduleDir, family);
      if (familyDir === undefined) {
        continue;
      }
      const suffix = parts.remainder.length > 0 ? `/${parts.remainder}` : "";
      const candidate = toForwardSlashes(familyDir) + suffix;
      if (host.tree.exists(candidate)) {
        existing.push(candidate);
      } else {
        missing.push(candidate);
      }
    }
    const result = [...existing, ...missing];
    return result.length > 0 ? result : [key];
  });
}

// same as resolveSymbolicKey, anchored at the module containing a document.
export function resolveSymbolicKeyFromFile(
  host: ResolverHost,
  filePath: string,
  key: string,
  defaultFamily?: ResourceFamilyKey,
): string[] {
  const fileDir = host.tree.parent(filePath);
  const moduleDir = fileDir === undefined ? undefined : findModuleRoot(host.tree, host.projectRoot, fileDir);
  if (moduleDir === undefined) {
    return [key];
  }
  return resolveSymbolicKey(host, moduleDir, key, defaultFamily);
}

// module directories addressed by the "version@component:module:" part of a key.
export function resolveModulePrefix(host: ResolverHost, moduleDir: string, key: string): string[] {
  const parts = parseSymbolicKey(key);
  return findTargetModuleDirs(host, moduleDir, { ...parts, family: undefined });
}

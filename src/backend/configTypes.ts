// the optional adocxref.jsonc file at the project root.
export interface ProjectConfig {
  exclude?: string[];
  documentExtensions?: string[];
  maxAttributeSubstitutions?: number;
}

// config with defaults applied.
export type ResolvedProjectConfig = Required<ProjectConfig>;

export const kConfigFileNames = ["adocxref.jsonc", "adocxref.json"] as const;

export const kDefaultConfig: ResolvedProjectConfig = {
  exclude: ["node_modules", ".git"],
  documentExtensions: [".adoc", ".asciidoc", ".asc"],
  maxAttributeSubstitutions: 64,
};

export function applyConfigDefaults(config: ProjectConfig): ResolvedProjectConfig {
  return {
    exclude: config.exclude ?? kDefaultConfig.exclude,
    documentExtensions: config.documentExtensions ?? kDefaultConfig.documentExtensions,
    maxAttributeSubstitutions: config.maxAttributeSubstitutions ?? kDefaultConfig.maxAttributeSubstitutions,
  };
}

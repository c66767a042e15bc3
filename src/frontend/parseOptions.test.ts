import { parseFamilyOption, parseProjectOptions, resolveLogFile } from "./parseOptions";

describe("command line option parsing", () => {
  it("maps root and config", () => {
    expect(parseProjectOptions({ root: "docs", config: "docs/adocxref.jsonc" })).toEqual({
      rootDir: "docs",
      configPath: "docs/adocxref.jsonc",
    });
  });

  it("accepts no options", () => {
    expect(parseProjectOptions()).toEqual({ rootDir: undefined, configPath: undefined });
  });

  it("parses known families", () => {
    expect(parseFamilyOption("partial")).toBe("partial");
    expect(parseFamilyOption(undefined)).toBeUndefined();
  });

  it("rejects unknown families", () => {
    expect(parseFamilyOption("images")).toBeUndefined();
  });

  it("prefers --log-file over the environment", () => {
    const env = { ADOCXREF_LOG_FILE: "env.log" };

    expect(resolveLogFile({ logFile: "cli.log" }, env)).toBe("cli.log");
    expect(resolveLogFile({}, env)).toBe("env.log");
    expect(resolveLogFile({}, {})).toBeNull();
  });
});

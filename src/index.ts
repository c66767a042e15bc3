#!/usr/bin/env node

import { Command } from "commander";
import { attrsCommand } from "./frontend/attrs";
import { checkCommand } from "./frontend/check";
import { runCommand } from "./frontend/core";
import { descriptorsCommand, idsCommand } from "./frontend/inspect";
import { CommandLineOptions } from "./frontend/parseOptions";
import { prefixesCommand, resolveCommand } from "./frontend/resolve";
import { tokensCommand } from "./frontend/tokens";
import * as console from "./utils/console";

function addProjectOptions(command: Command): Command {
  return command
    .option("-r, --root <dir>", "Project root (default: the current directory)")
    .option("-c, --config <file>", "Config file (default: adocxref.jsonc in the project root)")
    .option("--log-file <file>", "Append log output to this file");
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("adocxref")
    .description("Resolve Antora cross-references and attributes in AsciiDoc projects")
    .version("0.1.0", "-v, --version", "Output version information");

  program
    .command("tokens <file>")
    .alias("t")
    .description("Print the tokens of an AsciiDoc file")
    .action(async (file: string) => {
      await runCommand("tokens", () => tokensCommand(file));
    });

  addProjectOptions(
    program
      .command("resolve <file> <key>")
      .alias("r")
      .description("Resolve a resource key (e.g. mod:image$pic.png) as seen from a file")
      .option("-f, --family <family>", "Family for keys without one (example, attachment, partial, image, page)"),
  ).action(async (file: string, key: string, options?: CommandLineOptions) => {
    await runCommand("resolve", () => resolveCommand(file, key, options));
  });

  addProjectOptions(
    program
      .command("attrs <file> [text]")
      .alias("a")
      .description("Expand {name} references in text, or list the attributes visible from a file"),
  ).action(async (file: string, text?: string, options?: CommandLineOptions) => {
    await runCommand("attrs", () => attrsCommand(file, text, options));
  });

  addProjectOptions(
    program.command("prefixes <file>").alias("p").description("List the module prefixes usable from a file"),
  ).action(async (file: string, options?: CommandLineOptions) => {
    await runCommand("prefixes", () => prefixesCommand(file, options));
  });

  addProjectOptions(program.command("descriptors").alias("d").description("List the antora.yml files of the project")).action(
    async (options?: CommandLineOptions) => {
      await runCommand("descriptors", () => descriptorsCommand(options));
    },
  );

  addProjectOptions(
    program.command("ids [id]").alias("i").description("List block ids, or where one id is declared"),
  ).action(async (id?: string, options?: CommandLineOptions) => {
    await runCommand("ids", () => idsCommand(id, options));
  });

  addProjectOptions(
    program
      .command("check")
      .alias("c")
      .description("Report image, video, audio and include targets that do not resolve")
      .option("-w, --watch", "Check again whenever a file changes"),
  ).action(async (options?: CommandLineOptions) => {
    await runCommand("check", () => checkCommand(options));
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});

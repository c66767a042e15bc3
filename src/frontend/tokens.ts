import { formatTokens, tokenize } from "../backend/asciidocLexer";
import * as cons from "../utils/console";
import { readTextFileSync } from "../utils/fileSystem";
import { resolveFileArgument } from "./core";

export async function tokensCommand(filePath: string): Promise<void> {
  const absPath = resolveFileArgument(filePath);
  const text = readTextFileSync(absPath);
  if (text === undefined) {
    throw new Error(`Could not read ${absPath}`);
  }
  const tokens = tokenize(text);
  cons.output(formatTokens(tokens));
  cons.dim(`${tokens.length} token(s)`);
}

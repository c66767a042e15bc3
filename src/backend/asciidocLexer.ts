import { defineEnum } from "../utils/enum";

export const kTokenKind = defineEnum({
  TEXT: { value: "TEXT" },
  LINE_BREAK: { value: "LINE_BREAK" },
  LINE_COMMENT: { value: "LINE_COMMENT" },
  BLOCK_COMMENT: { value: "BLOCK_COMMENT" },
  LISTING_DELIMITER: { value: "LISTING_DELIMITER" },
  LISTING_TEXT: { value: "LISTING_TEXT" },
  HEADING: { value: "HEADING" },
  EXAMPLE_BLOCK_DELIMITER: { value: "EXAMPLE_BLOCK_DELIMITER" },
  TITLE: { value: "TITLE" },
  BLOCK_MACRO_ID: { value: "BLOCK_MACRO_ID" },
  BLOCK_MACRO_BODY: { value: "BLOCK_MACRO_BODY" },
  BLOCK_MACRO_ATTRIBUTES: { value: "BLOCK_MACRO_ATTRIBUTES" },
  BLOCK_ATTRS_START: { value: "BLOCK_ATTRS_START" },
  BLOCK_ATTR_NAME: { value: "BLOCK_ATTR_NAME" },
  BLOCK_ATTRS_END: { value: "BLOCK_ATTRS_END" },
} as const);

export type TokenKind = typeof kTokenKind.$key;

export type TextSpan = {
  start: number;
  length: number;
};

export type Token = {
  readonly kind: TokenKind;
  readonly span: TextSpan;
  readonly text: string;
};

type BlockKind = "listing" | "example" | "comment";

type OpenBlock = {
  kind: BlockKind;
  delimiter: string;
};

type LexerMode = "NORMAL" | "IN_LISTING" | "IN_EXAMPLE_BLOCK" | "IN_COMMENT_BLOCK" | "IN_BLOCK_ATTRS";

type PhysicalLine = {
  start: number;
  content: string; // without the line break
  lineBreak: string; // "\n", "\r\n" or "" for the last line
};

const LISTING_DELIMITER_PATTERN = /^-{4,}$/;
const EXAMPLE_DELIMITER_PATTERN = /^={4,}$/;
const COMMENT_DELIMITER_PATTERN = /^\/{4,}$/;
const HEADING_PATTERN = /^(=+) /;
const TITLE_PATTERN = /^\.[^\s]/;
// image::foo.png[Caption]
const BLOCK_MACRO_PATTERN = /^([a-zA-Z0-9_][a-zA-Z0-9_-]*::)([^\s[]*)(\[.*\])$/;

// one tokenization pass. not reusable.
class LexerState {
  readonly tokens: Token[] = [];
  readonly blocks: OpenBlock[] = [];
  mode: LexerMode = "NORMAL";

  // set while inside a comment block; the whole block becomes one token.
  commentStart = -1;

  emit(kind: TokenKind, start: number, text: string): void {
    if (text.length === 0) {
      return;
    }
    this.tokens.push({ kind, span: { start, length: text.length }, text });
  }

  top(): OpenBlock | undefined {
    return this.blocks[this.blocks.length - 1];
  }

  // opens a block, or closes the innermost one when it was opened by the same delimiter.
  toggle(kind: BlockKind, delimiter: string): "opened" | "closed" {
    if (this.closes(kind, delimiter)) {
      this.blocks.pop();
      this.syncMode();
      return "closed";
    }
    this.blocks.push({ kind, delimiter });
    this.syncMode();
    return "opened";
  }

  closes(kind: BlockKind, delimiter: string): boolean {
    const top = this.top();
    return top !== undefined && top.kind === kind && top.delimiter === delimiter;
  }

  syncMode(): void {
    switch (this.top()?.kind) {
      case "listing":
        this.mode = "IN_LISTING";
        break;
      case "comment":
        this.mode = "IN_COMMENT_BLOCK";
        break;
      case "example":
        this.mode = "IN_EXAMPLE_BLOCK";
        break;
      default:
        this.mode = "NORMAL";
    }
  }
}

function splitLines(text: string): PhysicalLine[] {
  const lines: PhysicalLine[] = [];
  let start = 0;
  while (start <= text.length) {
    const newline = text.indexOf("\n", start);
    if (newline === -1) {
      lines.push({ start, content: text.substring(start), lineBreak: "" });
      break;
    }
    const hasCarriageReturn = newline > start && text.charAt(newline - 1) === "\r";
    const contentEnd = hasCarriageReturn ? newline - 1 : newline;
    lines.push({
      start,
      content: text.substring(start, contentEnd),
      lineBreak: text.substring(contentEnd, newline + 1),
    });
    start = newline + 1;
  }
  return lines;
}

// "[NOTE]" / "[source,java]" -> start, names, end; anything after "]" is plain text.
function tokenizeBlockAttributes(state: LexerState, line: PhysicalLine): void {
  state.mode = "IN_BLOCK_ATTRS";
  const content = line.content;
  state.emit("BLOCK_ATTRS_START", line.start, "[");

  let pos = 1;
  let nameStart = pos;
  const flushName = () => {
    state.emit("BLOCK_ATTR_NAME", line.start + nameStart, content.substring(nameStart, pos));
  };
  while (pos < content.length && state.mode === "IN_BLOCK_ATTRS") {
    const ch = content.charAt(pos);
    if (ch === "]") {
      flushName();
      state.emit("BLOCK_ATTRS_END", line.start + pos, "]");
      pos += 1;
      state.mode = "NORMAL";
    } else if (ch === ",") {
      flushName();
      state.emit("TEXT", line.start + pos, ",");
      pos += 1;
      nameStart = pos;
    } else {
      pos += 1;
    }
  }
  if (state.mode === "IN_BLOCK_ATTRS") {
    // unterminated list
    flushName();
  } else {
    state.emit("TEXT", line.start + pos, content.substring(pos));
  }
  // back to the enclosing block's mode (example content can carry attribute lists)
  state.syncMode();
}

function tokenizeStructuralLine(state: LexerState, line: PhysicalLine): void {
  const content = line.content;

  if (HEADING_PATTERN.test(content)) {
    state.emit("HEADING", line.start, content);
    return;
  }
  if (content.startsWith("//")) {
    state.emit("LINE_COMMENT", line.start, content);
    return;
  }
  if (TITLE_PATTERN.test(content)) {
    state.emit("TITLE", line.start, content);
    return;
  }
  const macro = BLOCK_MACRO_PATTERN.exec(content);
  if (macro) {
    const [, id, body, attributes] = macro;
    state.emit("BLOCK_MACRO_ID", line.start, id);
    state.emit("BLOCK_MACRO_BODY", line.start + id.length, body);
    state.emit("BLOCK_MACRO_ATTRIBUTES", line.start + id.length + body.length, attributes);
    return;
  }
  if (content.startsWith("[") && !content.startsWith("[[")) {
    tokenizeBlockAttributes(state, line);
    return;
  }
  state.emit("TEXT", line.start, content);
}

function tokenizeLine(state: LexerState, text: string, line: PhysicalLine): void {
  const content = line.content;

  if (state.mode === "IN_COMMENT_BLOCK") {
    // verbatim: only the opening delimiter closes the block, nothing nests
    if (state.closes("comment", content)) {
      state.toggle("comment", content);
      const end = line.start + content.length;
      state.emit("BLOCK_COMMENT", state.commentStart, text.substring(state.commentStart, end));
      state.commentStart = -1;
      state.emit("LINE_BREAK", end, line.lineBreak);
    }
    return;
  }

  if (state.mode === "IN_LISTING") {
    if (state.closes("listing", content)) {
      state.toggle("listing", content);
      state.emit("LISTING_DELIMITER", line.start, content);
    } else {
      state.emit("LISTING_TEXT", line.start, content);
    }
    state.emit("LINE_BREAK", line.start + content.length, line.lineBreak);
    return;
  }

  if (LISTING_DELIMITER_PATTERN.test(content)) {
    state.toggle("listing", content);
    state.emit("LISTING_DELIMITER", line.start, content);
    state.emit("LINE_BREAK", line.start + content.length, line.lineBreak);
    return;
  }
  if (EXAMPLE_DELIMITER_PATTERN.test(content)) {
    state.toggle("example", content);
    // the delimiter token carries its own line break
    state.emit("EXAMPLE_BLOCK_DELIMITER", line.start, content + line.lineBreak);
    return;
  }
  if (COMMENT_DELIMITER_PATTERN.test(content)) {
    state.toggle("comment", content);
    state.commentStart = line.start;
    return;
  }

  tokenizeStructuralLine(state, line);
  state.emit("LINE_BREAK", line.start + content.length, line.lineBreak);
}

// Splits AsciiDoc text into typed tokens. Never fails: anything that is not
// recognized is TEXT, and the token texts concatenate back to the input.
export function tokenize(text: string): Token[] {
  const state = new LexerState();
  for (const line of splitLines(text)) {
    tokenizeLine(state, text, line);
  }
  if (state.mode === "IN_COMMENT_BLOCK" && state.commentStart >= 0) {
    // unterminated comment block runs to the end of the input
    state.emit("BLOCK_COMMENT", state.commentStart, text.substring(state.commentStart));
  }
  return state.tokens;
}

export function headingLevel(token: Token): number {
  if (token.kind !== "HEADING") {
    return 0;
  }
  const match = HEADING_PATTERN.exec(token.text);
  return match ? match[1].length : 0;
}

// "KIND ('text')" per token, one per line; line breaks escaped.
export function formatTokens(tokens: readonly Token[]): string {
  return tokens.map((token) => `${token.kind} ('${escapeTokenText(token.text)}')`).join("\n");
}

function escapeTokenText(text: string): string {
  return text.replace(/\r/g, "\\r").replace(/\n/g, "\\n");
}

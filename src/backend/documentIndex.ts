import { tokenize, Token } from "./asciidocLexer";
import { BlockIdDeclaration, DeclarationIndex, IndexedAttribute, ResolverHost } from "./hostTypes";

// :name: value / :name!: / :!name:
const ATTRIBUTE_ENTRY_PATTERN = /^:(!?)([a-zA-Z0-9_][a-zA-Z0-9_-]*)(!?):(?:[ \t]+(.*))?$/;
// [[id]] / [[id,label]]
const BLOCK_ANCHOR_PATTERN = /^\[\[([a-zA-Z_:][\w:.-]*)(?:,[^\]]*)?\]\]$/;
// anchor:id[]
const INLINE_ANCHOR_PATTERN = /anchor:([a-zA-Z_:][\w:.-]*)\[[^\]]*\]/g;
// "#id" in an attribute list, optionally after the style and before roles/options
const SHORTHAND_ID_PATTERN = /^[\w-]*#([a-zA-Z_:][\w:-]*)/;

export class MultiMapIndex<T> implements DeclarationIndex<T> {
  private readonly entries = new Map<string, T[]>();

  add(key: string, value: T): void {
    let list = this.entries.get(key);
    if (!list) {
      list = [];
      this.entries.set(key, list);
    }
    list.push(value);
  }

  get(key: string): readonly T[] {
    return this.entries.get(key) ?? [];
  }

  keys(): string[] {
    return Array.from(this.entries.keys()).sort();
  }

  values(): T[] {
    return this.keys().flatMap((key) => this.get(key));
  }
}

export type DocumentIndex = {
  attributes: MultiMapIndex<IndexedAttribute>;
  blockIds: MultiMapIndex<BlockIdDeclaration>;
};

export type DocumentSource = {
  path: string;
  text: string;
};

// 1-based line of an offset.
export function makeLineLookup(text: string): (offset: number) => number {
  const lineStarts = [0];
  for (let i = 0; i < text.length; ++i) {
    if (text.charCodeAt(i) === 10) {
      lineStarts.push(i + 1);
    }
  }
  return (offset: number) => {
    let lo = 0;
    let hi = lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (lineStarts[mid] <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo + 1;
  };
}

// the attribute entry starting at tokens[i], with its continuation lines.
function readAttributeEntry(
  tokens: readonly Token[],
  i: number,
): { name: string; value: string | undefined } | undefined {
  const match = ATTRIBUTE_ENTRY_PATTERN.exec(tokens[i].text);
  if (!match) {
    return undefined;
  }
  const [, leadingBang, name, trailingBang, rawValue] = match;
  if (leadingBang || trailingBang) {
    return { name: name.toLowerCase(), value: undefined };
  }
  let value = (rawValue ?? "").trim();
  // a value ending in " \" continues on the next line
  let next = i + 2;
  while (value.endsWith(" \\") && tokens[next]?.kind === "TEXT" && tokens[next - 1].kind === "LINE_BREAK") {
    value = `${value.slice(0, -1).trimEnd()} ${tokens[next].text.trim()}`;
    next += 2;
  }
  return { name: name.toLowerCase(), value };
}

export function indexDocument(index: DocumentIndex, source: DocumentSource): void {
  const tokens = tokenize(source.text);
  const lineOf = makeLineLookup(source.text);

  tokens.forEach((token, i) => {
    const atLineStart = token.span.start === 0 || source.text.charAt(token.span.start - 1) === "\n";
    const line = lineOf(token.span.start);

    if (token.kind === "TEXT" && atLineStart) {
      const entry = readAttributeEntry(tokens, i);
      if (entry) {
        index.attributes.add(entry.name, { ...entry, file: source.path, line });
        return;
      }
      const anchor = BLOCK_ANCHOR_PATTERN.exec(token.text);
      if (anchor) {
        index.blockIds.add(anchor[1], { id: anchor[1], file: source.path, line });
        return;
      }
    }

    if (token.kind === "TEXT") {
      for (const inline of token.text.matchAll(INLINE_ANCHOR_PATTERN)) {
        index.blockIds.add(inline[1], { id: inline[1], file: source.path, line });
      }
      return;
    }

    // only the first attribute of a list carries the shorthand id
    if (token.kind === "BLOCK_ATTR_NAME" && tokens[i - 1]?.kind === "BLOCK_ATTRS_START") {
      const shorthand = SHORTHAND_ID_PATTERN.exec(token.text.trim());
      if (shorthand) {
        index.blockIds.add(shorthand[1], { id: shorthand[1], file: source.path, line });
      }
    }
  });
}

export function buildDocumentIndex(sources: readonly DocumentSource[]): DocumentIndex {
  const index: DocumentIndex = {
    attributes: new MultiMapIndex<IndexedAttribute>(),
    blockIds: new MultiMapIndex<BlockIdDeclaration>(),
  };
  for (const source of sources) {
    indexDocument(index, source);
  }
  return index;
}

// block ids declared anywhere in the project under this id; an empty key finds nothing.
export function findIds(host: ResolverHost, key: string): BlockIdDeclaration[] {
  if (key.length === 0) {
    return [];
  }
  return host.runReadAction(() => [...host.blockIdIndex.get(key)]);
}

import { formatTokens, headingLevel, kTokenKind, tokenize } from "./asciidocLexer";

function lex(text: string): string {
  return formatTokens(tokenize(text));
}

describe("AsciiDoc lexer", () => {
  it("should split plain text lines with line breaks", () => {
    expect(lex("abc\ndef")).toBe(["TEXT ('abc')", "LINE_BREAK ('\\n')", "TEXT ('def')"].join("\n"));
  });

  it("should produce no tokens for empty input", () => {
    expect(tokenize("")).toEqual([]);
  });

  it("should tokenize line comments", () => {
    expect(lex("// foo\n// bar")).toBe(
      ["LINE_COMMENT ('// foo')", "LINE_BREAK ('\\n')", "LINE_COMMENT ('// bar')"].join("\n"),
    );
  });

  it("should keep listing content verbatim", () => {
    expect(lex("aaa\n----\nbbbb\n----\ncccc")).toBe(
      [
        "TEXT ('aaa')",
        "LINE_BREAK ('\\n')",
        "LISTING_DELIMITER ('----')",
        "LINE_BREAK ('\\n')",
        "LISTING_TEXT ('bbbb')",
        "LINE_BREAK ('\\n')",
        "LISTING_DELIMITER ('----')",
        "LINE_BREAK ('\\n')",
        "TEXT ('cccc')",
      ].join("\n"),
    );
  });

  it("should tokenize a listing at the start of the input", () => {
    const kinds = tokenize("----\nbbbb\n----\ncccc").map((t) => t.kind);
    expect(kinds).toEqual([
      "LISTING_DELIMITER",
      "LINE_BREAK",
      "LISTING_TEXT",
      "LINE_BREAK",
      "LISTING_DELIMITER",
      "LINE_BREAK",
      "TEXT",
    ]);
  });

  it("should not interpret structure inside a listing", () => {
    expect(lex("----\n= Not a heading\nimage::x.png[]\n------\n----")).toBe(
      [
        "LISTING_DELIMITER ('----')",
        "LINE_BREAK ('\\n')",
        "LISTING_TEXT ('= Not a heading')",
        "LINE_BREAK ('\\n')",
        "LISTING_TEXT ('image::x.png[]')",
        "LINE_BREAK ('\\n')",
        "LISTING_TEXT ('------')",
        "LINE_BREAK ('\\n')",
        "LISTING_DELIMITER ('----')",
      ].join("\n"),
    );
  });

  it("should tokenize headings with their level", () => {
    const tokens = tokenize("= Abc\nabc\n== Def\ndef");
    expect(formatTokens(tokens)).toBe(
      [
        "HEADING ('= Abc')",
        "LINE_BREAK ('\\n')",
        "TEXT ('abc')",
        "LINE_BREAK ('\\n')",
        "HEADING ('== Def')",
        "LINE_BREAK ('\\n')",
        "TEXT ('def')",
      ].join("\n"),
    );
    expect(headingLevel(tokens[0])).toBe(1);
    expect(headingLevel(tokens[4])).toBe(2);
    expect(headingLevel(tokens[2])).toBe(0);
  });

  it("should turn a comment block into one token", () => {
    expect(lex("////\nfoo bar\n////\nabc")).toBe(
      ["BLOCK_COMMENT ('////\\nfoo bar\\n////')", "LINE_BREAK ('\\n')", "TEXT ('abc')"].join("\n"),
    );
  });

  it("should run an unterminated comment block to the end", () => {
    expect(lex("////\nfoo\n//////")).toBe("BLOCK_COMMENT ('////\\nfoo\\n//////')");
  });

  it("should split block macros into id, body and attributes", () => {
    expect(lex("image::foo.png[Caption]\nabc")).toBe(
      [
        "BLOCK_MACRO_ID ('image::')",
        "BLOCK_MACRO_BODY ('foo.png')",
        "BLOCK_MACRO_ATTRIBUTES ('[Caption]')",
        "LINE_BREAK ('\\n')",
        "TEXT ('abc')",
      ].join("\n"),
    );
  });

  it("should omit the body of a block macro without target", () => {
    expect(lex("toc::[]")).toBe(["BLOCK_MACRO_ID ('toc::')", "BLOCK_MACRO_ATTRIBUTES ('[]')"].join("\n"));
  });

  it("should degrade a macro without attribute list to text", () => {
    expect(lex("image::foo.png")).toBe("TEXT ('image::foo.png')");
  });

  it("should tokenize example blocks with the delimiter owning its line break", () => {
    expect(lex("====\nFoo Bar Baz\n====\n")).toBe(
      [
        "EXAMPLE_BLOCK_DELIMITER ('====\\n')",
        "TEXT ('Foo Bar Baz')",
        "LINE_BREAK ('\\n')",
        "EXAMPLE_BLOCK_DELIMITER ('====\\n')",
      ].join("\n"),
    );
  });

  it("should tokenize structure inside example blocks", () => {
    const kinds = tokenize("====\n.Title\n----\nx\n----\n====").map((t) => t.kind);
    expect(kinds).toEqual([
      "EXAMPLE_BLOCK_DELIMITER",
      "TITLE",
      "LINE_BREAK",
      "LISTING_DELIMITER",
      "LINE_BREAK",
      "LISTING_TEXT",
      "LINE_BREAK",
      "LISTING_DELIMITER",
      "LINE_BREAK",
      "EXAMPLE_BLOCK_DELIMITER",
    ]);
  });

  it("should tokenize titles", () => {
    expect(lex(".Foo bar baz\nFoo bar baz")).toBe(
      ["TITLE ('.Foo bar baz')", "LINE_BREAK ('\\n')", "TEXT ('Foo bar baz')"].join("\n"),
    );
    expect(lex(". not a title")).toBe("TEXT ('. not a title')");
  });

  it("should tokenize block attributes", () => {
    expect(lex("[NOTE]\n")).toBe(
      ["BLOCK_ATTRS_START ('[')", "BLOCK_ATTR_NAME ('NOTE')", "BLOCK_ATTRS_END (']')", "LINE_BREAK ('\\n')"].join(
        "\n",
      ),
    );
  });

  it("should separate attribute names at commas", () => {
    expect(lex("[source,java]")).toBe(
      [
        "BLOCK_ATTRS_START ('[')",
        "BLOCK_ATTR_NAME ('source')",
        "TEXT (',')",
        "BLOCK_ATTR_NAME ('java')",
        "BLOCK_ATTRS_END (']')",
      ].join("\n"),
    );
  });

  it("should keep an unterminated attribute list", () => {
    expect(lex("[NOTE")).toBe(["BLOCK_ATTRS_START ('[')", "BLOCK_ATTR_NAME ('NOTE')"].join("\n"));
  });

  it("should treat block anchors as text", () => {
    expect(lex("[[anchor]]")).toBe("TEXT ('[[anchor]]')");
  });

  it("should keep carriage returns in line breaks", () => {
    expect(lex("a\r\n----\r\nb")).toBe(
      [
        "TEXT ('a')",
        "LINE_BREAK ('\\r\\n')",
        "LISTING_DELIMITER ('----')",
        "LINE_BREAK ('\\r\\n')",
        "LISTING_TEXT ('b')",
      ].join("\n"),
    );
  });

  it("should only produce known token kinds with consistent spans", () => {
    const text = "= T\n[NOTE]\n====\nimage::a.png[x]\n====\n// c\n";
    let offset = 0;
    for (const token of tokenize(text)) {
      expect(kTokenKind.isValidKey(token.kind)).toBe(true);
      expect(token.span.start).toBe(offset);
      expect(token.span.length).toBe(token.text.length);
      offset += token.text.length;
    }
    expect(offset).toBe(text.length);
  });

  describe("round trip", () => {
    const inputs = [
      "abc\ndef",
      "----\nbbbb\n----\ncccc",
      "////\nfoo bar\n////\nabc",
      "====\nFoo Bar Baz\n====\n",
      "[source,java]trailing\r\n----\r\ncode\r\n",
      "include::partial$x.adoc[]\n\n\n.Title\n== Heading\n[[id]]\n//// unterminated",
      "[unterminated\nimage::[]\n",
    ];

    it.each(inputs)("should reproduce the input from token texts: %j", (input) => {
      const tokens = tokenize(input);
      expect(tokens.map((t) => t.text).join("")).toBe(input);
    });

    it.each(inputs)("should produce the same tokens when tokenizing again: %j", (input) => {
      const tokens = tokenize(input);
      expect(tokenize(tokens.map((t) => t.text).join(""))).toEqual(tokens);
    });
  });
});

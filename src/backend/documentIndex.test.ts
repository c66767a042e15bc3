import { buildDocumentIndex, findIds, MultiMapIndex } from "./documentIndex";
import { DocsProject } from "./project";
import { makeTempDir, removeTempDir, writeFile } from "./testProject";

const kDocument = [
  "= Title",
  ":author: Jane Doe",
  ":description: first part \\",
  "continued here",
  ":!hidden:",
  ":shown!:",
  "",
  "[[intro]]",
  "== Intro",
  "",
  "[[with-label,Label]]",
  "Some text with anchor:inline-id[] inside.",
  "",
  "[#short.role]",
  "----",
  "[[not-an-id]]",
  ":not-attr: x",
  "----",
  "",
  "[source#listing-id,java]",
].join("\n");

describe("MultiMapIndex", () => {
  it("keeps values per key in insertion order", () => {
    const index = new MultiMapIndex<number>();
    index.add("b", 1);
    index.add("a", 2);
    index.add("b", 3);

    expect(index.get("b")).toEqual([1, 3]);
    expect(index.get("c")).toEqual([]);
    expect(index.keys()).toEqual(["a", "b"]);
    expect(index.values()).toEqual([2, 1, 3]);
  });
});

describe("buildDocumentIndex", () => {
  const index = buildDocumentIndex([{ path: "/docs/page.adoc", text: kDocument }]);

  it("indexes attribute entries outside of listings", () => {
    expect(index.attributes.keys()).toEqual(["author", "description", "hidden", "shown"]);
    expect(index.attributes.get("author")).toEqual([
      { name: "author", value: "Jane Doe", file: "/docs/page.adoc", line: 2 },
    ]);
  });

  it("joins continued values", () => {
    expect(index.attributes.get("description")[0]?.value).toBe("first part continued here");
  });

  it("indexes unset entries without value", () => {
    expect(index.attributes.get("hidden")).toEqual([{ name: "hidden", value: undefined, file: "/docs/page.adoc", line: 5 }]);
    expect(index.attributes.get("shown")[0]?.value).toBeUndefined();
  });

  it("indexes block ids", () => {
    expect(index.blockIds.keys()).toEqual(["inline-id", "intro", "listing-id", "short", "with-label"]);
    expect(index.blockIds.values().map((d) => [d.id, d.line])).toEqual([
      ["inline-id", 12],
      ["intro", 8],
      ["listing-id", 20],
      ["short", 14],
      ["with-label", 11],
    ]);
  });

  it("lowercases attribute names", () => {
    const mixed = buildDocumentIndex([{ path: "/a.adoc", text: ":Product-Name: Widget\n" }]);

    expect(mixed.attributes.keys()).toEqual(["product-name"]);
  });
});

describe("findIds", () => {
  let root: string;
  let project: DocsProject;

  beforeAll(() => {
    root = makeTempDir("ids");
    writeFile(root, "a.adoc", "[[setup]]\n== Setup\n");
    writeFile(root, "b.adoc", "text\n\n[[setup]]\n== Setup again\n");
    project = new DocsProject({ projectRoot: root });
  });

  afterAll(() => {
    removeTempDir(root);
  });

  it("finds every declaration of an id", () => {
    expect(findIds(project, "setup")).toEqual([
      { id: "setup", file: `${root}/a.adoc`, line: 1 },
      { id: "setup", file: `${root}/b.adoc`, line: 3 },
    ]);
  });

  it("finds nothing for an empty key", () => {
    expect(findIds(project, "")).toEqual([]);
  });
});

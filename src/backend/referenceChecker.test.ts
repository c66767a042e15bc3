import { DocsProject } from "./project";
import { checkProjectReferences } from "./referenceChecker";
import { makeTempDir, removeTempDir, writeFile } from "./testProject";

const kIndexPage = [
  "= Index",
  ":imgname: logo.png",
  "",
  "image::{imgname}[Logo]",
  "image::missing.png[]",
  "image::https://example.com/remote.png[]",
  "include::partial$shared.adoc[]",
  "include::local.adoc[]",
  "video::mod-b:image$clip.mp4[]",
  "image::{ambiguous}.png[]",
  "toc::[]",
  "",
  "----",
  "image::ignored.png[]",
  "----",
  "",
].join("\n");

describe("checkProjectReferences", () => {
  let root: string;
  let project: DocsProject;

  beforeAll(() => {
    root = makeTempDir("check");
    writeFile(root, "docs/antora.yml", "name: c\nversion: v\n");
    writeFile(root, "docs/modules/ROOT/pages/index.adoc", kIndexPage);
    writeFile(root, "docs/modules/ROOT/pages/local.adoc", "local\n");
    writeFile(root, "docs/modules/ROOT/images/logo.png", "png");
    writeFile(root, "docs/modules/ROOT/partials/shared.adoc", "shared\n");
    writeFile(root, "docs/modules/mod-b/images/clip.mp4", "mp4");
    writeFile(root, "notes/a.adoc", ":ambiguous: one\n");
    writeFile(root, "notes/b.adoc", ":ambiguous: two\n");
    writeFile(root, "readme.adoc", "image::diagram.png[]\n");
    writeFile(root, "diagram.png", "png");
    project = new DocsProject({ projectRoot: root });
  });

  afterAll(() => {
    removeTempDir(root);
  });

  it("checks every resource macro outside of listings", () => {
    const results = checkProjectReferences(project);

    expect(results.map((r) => [r.file.substring(root.length), r.line, r.macro, r.status])).toEqual([
      ["/docs/modules/ROOT/pages/index.adoc", 4, "image", "resolved"],
      ["/docs/modules/ROOT/pages/index.adoc", 5, "image", "missing"],
      ["/docs/modules/ROOT/pages/index.adoc", 7, "include", "resolved"],
      ["/docs/modules/ROOT/pages/index.adoc", 8, "include", "resolved"],
      ["/docs/modules/ROOT/pages/index.adoc", 9, "video", "resolved"],
      ["/docs/modules/ROOT/pages/index.adoc", 10, "image", "ambiguous"],
      ["/readme.adoc", 1, "image", "resolved"],
    ]);
  });

  it("reports the candidates of an unresolved image", () => {
    const missing = checkProjectReferences(project).find((r) => r.status === "missing");

    expect(missing).toEqual({
      file: `${root}/docs/modules/ROOT/pages/index.adoc`,
      line: 5,
      macro: "image",
      target: "missing.png",
      status: "missing",
      candidates: [`${root}/docs/modules/ROOT/images/missing.png`],
    });
  });

  it("resolves attribute references in targets", () => {
    const logo = checkProjectReferences(project).find((r) => r.line === 4);

    expect(logo?.target).toBe("{imgname}");
    expect(logo?.candidates).toEqual([`${root}/docs/modules/ROOT/images/logo.png`]);
  });

  it("resolves targets outside of modules relative to the document", () => {
    const readme = checkProjectReferences(project).find((r) => r.file === `${root}/readme.adoc`);

    expect(readme?.candidates).toEqual([`${root}/diagram.png`]);
  });
});

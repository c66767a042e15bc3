import { formatProblem } from "./check";

describe("reference problem formatting", () => {
  const base = {
    file: "/proj/docs/modules/ROOT/pages/index.adoc",
    line: 5,
    macro: "image",
    target: "missing.png",
  };

  it("lists the tried candidates of a missing target", () => {
    const line = formatProblem(
      { ...base, status: "missing", candidates: ["/proj/docs/modules/ROOT/images/missing.png"] },
      "/proj",
    );

    expect(line).toBe(
      "docs/modules/ROOT/pages/index.adoc:5: image::missing.png[] not found (tried /proj/docs/modules/ROOT/images/missing.png)",
    );
  });

  it("explains an ambiguous target", () => {
    const line = formatProblem({ ...base, target: "{img}", status: "ambiguous", candidates: [] }, "/proj");

    expect(line).toBe("docs/modules/ROOT/pages/index.adoc:5: image::{img}[] has an attribute with conflicting values");
  });

  it("keeps files outside the project root absolute", () => {
    const line = formatProblem({ ...base, status: "missing", candidates: [] }, "/elsewhere");

    expect(line).toBe("/proj/docs/modules/ROOT/pages/index.adoc:5: image::missing.png[] not found (tried )");
  });
});

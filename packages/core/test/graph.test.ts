import { describe, expect, it } from "vitest";

import { DependencyGraph, type DependencyNodeInput } from "../src/graph/index.js";
import { golangPurl, npmPurl, pypiPurl } from "../src/purl.js";

function node(name: string, overrides: Partial<DependencyNodeInput> = {}): DependencyNodeInput {
  return {
    key: `${name}@1.0.0`,
    name,
    version: "1.0.0",
    purl: npmPurl(name, "1.0.0"),
    origin: { kind: "registry", location: "https://registry.test" },
    scope: "runtime",
    role: "transitive",
    artifacts: [],
    ...overrides,
  };
}

describe("DependencyGraph", () => {
  it("resolves a two-node cycle once per node", () => {
    const graph = new DependencyGraph("npm", ".");
    graph.add(node("a", { role: "direct" }));
    graph.add(node("b"));
    graph.addEdge("a@1.0.0", "b@1.0.0");
    graph.addEdge("b@1.0.0", "a@1.0.0");
    graph.markRoot("a@1.0.0");

    expect(graph.traverse().map((entry) => entry.name)).toEqual(["a", "b"]);
    expect(graph.dependenciesOf("b@1.0.0").map((entry) => entry.name)).toEqual(["a"]);
  });

  it("visits breadth first from roots in declaration order, then unreachable nodes", () => {
    const graph = new DependencyGraph("npm", ".");
    for (const name of ["orphan", "c", "b", "a", "d"]) {
      graph.add(node(name));
    }
    graph.addEdge("b@1.0.0", "d@1.0.0");
    graph.addEdge("a@1.0.0", "c@1.0.0");
    graph.markRoot("b@1.0.0");
    graph.markRoot("a@1.0.0");

    expect(graph.traverse().map((entry) => entry.name)).toEqual(["b", "d", "a", "c", "orphan"]);
    expect(graph.roots.map((entry) => entry.name)).toEqual(["b", "a"]);
  });

  it("upgrades role and scope when a node is seen again", () => {
    const graph = new DependencyGraph("yarn", ".");
    graph.add(node("x", { scope: "dev" }));
    const again = graph.add(node("x", { role: "direct", scope: "runtime" }));

    expect(graph.size).toBe(1);
    expect(again.role).toBe("direct");
    expect(again.scope).toBe("runtime");
  });

  it("replaces environment values by name", () => {
    const graph = new DependencyGraph("gomod", ".");
    graph.setEnvironment("GOFLAGS", "-mod=mod");
    graph.setEnvironment("GOFLAGS", "-mod=vendor");

    expect(graph.environment).toEqual([{ name: "GOFLAGS", value: "-mod=vendor", kind: "literal" }]);
  });

  it("rejects edges to unknown nodes", () => {
    const graph = new DependencyGraph("npm", ".");
    graph.add(node("a"));
    expect(() => graph.addEdge("a@1.0.0", "missing@1.0.0")).toThrow("Cannot link unknown nodes a@1.0.0 -> missing@1.0.0");
  });
});

describe("package URLs", () => {
  it("encodes namespaces and sorts qualifiers", () => {
    expect(npmPurl("@babel/core", "7.24.0")).toBe("pkg:npm/%40babel/core@7.24.0");
    expect(pypiPurl("Zope.Interface", "6.0", { vcs_url: "git+https://example.test/z.git@abc", checksum: "sha256:aa" })).toBe(
      "pkg:pypi/zope-interface@6.0?checksum=sha256:aa&vcs_url=git%2Bhttps://example.test/z.git%40abc",
    );
    expect(golangPurl("github.com/pkg/errors", "v0.9.1")).toBe("pkg:golang/github.com/pkg/errors@v0.9.1");
  });
});

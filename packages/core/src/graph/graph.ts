import type {
  ComponentOrigin,
  ComponentRole,
  ComponentScope,
  EcosystemName,
  EnvTemplate,
  EnvValueKind,
  ProjectFileTemplate,
} from "@prefetch/types";

import type { Digest, DigestPolicy } from "../integrity/index.js";

export interface ArtifactSpec {
  url: string;
  /** File name inside `deps/<ecosystem>/` */
  fileName: string;
  digests: readonly Digest[];
  policy: DigestPolicy;
  /** Cache identity shared by several nodes; `<node key>/<fileName>` otherwise */
  identity?: string;
  /** Tree hash checked after download, e.g. Go `h1:` */
  treeHash?: { kind: "go-zip" | "go-mod"; value: string };
  /** Built with `git archive` instead of downloaded; `url` is then only descriptive */
  git?: GitArchiveSource;
}

export interface GitArchiveSource {
  remote: string;
  commit: string;
  /** Top-level directory inside the tarball */
  prefix: string;
}

export interface DependencyNodeInput {
  /** Unique per identity within one resolution run */
  key: string;
  name: string;
  version: string;
  purl: string;
  origin: ComponentOrigin;
  scope: ComponentScope;
  role: ComponentRole;
  artifacts: readonly ArtifactSpec[];
  properties?: Record<string, string>;
}

export interface DependencyNode extends DependencyNodeInput {
  readonly index: number;
  properties: Record<string, string>;
}

/**
 * Arena of resolved packages. Edges are index sets, so cycles need no special handling.
 */
export class DependencyGraph {
  readonly nodes: DependencyNode[] = [];
  private readonly byKey = new Map<string, number>();
  private readonly edges: Set<number>[] = [];
  private readonly rootIndices: number[] = [];
  /** Environment the build needs to consume this graph offline */
  readonly environment: EnvTemplate[] = [];
  /** Files to inject into the project or output directory */
  readonly projectFiles: ProjectFileTemplate[] = [];

  constructor(
    readonly ecosystem: EcosystemName,
    readonly packagePath: string,
  ) {}

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Adds a node, or returns the existing one for the same key.
   * A second sighting as direct or runtime upgrades the existing node.
   */
  add(input: DependencyNodeInput): DependencyNode {
    const existingIndex = this.byKey.get(input.key);
    if (existingIndex !== undefined) {
      const existing = this.nodes[existingIndex];
      if (existing === undefined) {
        throw new Error(`Graph index out of sync for ${input.key}`);
      }
      if (input.role === "direct") {
        existing.role = "direct";
      }
      if (input.scope === "runtime") {
        existing.scope = "runtime";
      }
      return existing;
    }

    const node: DependencyNode = {
      ...input,
      properties: { ...input.properties },
      index: this.nodes.length,
    };
    this.nodes.push(node);
    this.edges.push(new Set());
    this.byKey.set(input.key, node.index);
    return node;
  }

  setEnvironment(name: string, value: string, kind: EnvValueKind = "literal"): void {
    const existing = this.environment.findIndex((entry) => entry.name === name);
    if (existing >= 0) {
      this.environment.splice(existing, 1, { name, value, kind });
      return;
    }
    this.environment.push({ name, value, kind });
  }

  addProjectFile(filePath: string, template: string): void {
    this.projectFiles.push({ path: filePath, template });
  }

  get(key: string): DependencyNode | undefined {
    const index = this.byKey.get(key);
    return index === undefined ? undefined : this.nodes[index];
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }

  addEdge(fromKey: string, toKey: string): void {
    const from = this.byKey.get(fromKey);
    const to = this.byKey.get(toKey);
    if (from === undefined || to === undefined) {
      throw new Error(`Cannot link unknown nodes ${fromKey} -> ${toKey}`);
    }
    this.edges[from]?.add(to);
  }

  /** Declares a traversal root, in declaration order. */
  markRoot(key: string): void {
    const index = this.byKey.get(key);
    if (index === undefined) {
      throw new Error(`Unknown root ${key}`);
    }
    if (!this.rootIndices.includes(index)) {
      this.rootIndices.push(index);
    }
  }

  dependenciesOf(key: string): DependencyNode[] {
    const index = this.byKey.get(key);
    if (index === undefined) {
      return [];
    }
    return [...(this.edges[index] ?? [])].sort((a, b) => a - b).flatMap((target) => {
      const node = this.nodes[target];
      return node === undefined ? [] : [node];
    });
  }

  get roots(): readonly DependencyNode[] {
    return this.rootIndices.flatMap((index) => {
      const node = this.nodes[index];
      return node === undefined ? [] : [node];
    });
  }

  /**
   * Breadth-first from the roots in declaration order, children by insertion order,
   * then every unreachable node in insertion order. Each node appears once.
   */
  traverse(): DependencyNode[] {
    const visited = new Set<number>();
    const order: DependencyNode[] = [];
    const queue: number[] = [];

    const visit = (index: number): void => {
      if (visited.has(index)) {
        return;
      }
      visited.add(index);
      queue.push(index);
    };

    const drain = (): void => {
      while (queue.length > 0) {
        const index = queue.shift();
        if (index === undefined) {
          break;
        }
        const node = this.nodes[index];
        if (node !== undefined) {
          order.push(node);
        }
        for (const target of [...(this.edges[index] ?? [])].sort((a, b) => a - b)) {
          visit(target);
        }
      }
    };

    for (const root of this.rootIndices) {
      visit(root);
      drain();
    }
    for (let index = 0; index < this.nodes.length; index += 1) {
      visit(index);
      drain();
    }

    return order;
  }
}

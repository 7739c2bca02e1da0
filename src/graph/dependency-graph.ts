import type { ImportReference } from "../core/types.js";
import { compareStrings, toPosixPath } from "../core/utils.js";

export const EXTERNAL_PREFIX = "external:";

const RESOLVE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"] as const;

/** Emitted-extension imports (`./a.js`) that point at sources (`./a.ts`). */
const EXTENSION_SUBSTITUTES: Record<string, readonly string[]> = {
  ".js": [".ts", ".tsx"],
  ".jsx": [".tsx"],
  ".mjs": [".mts"],
  ".cjs": [".cts"],
};

export interface DependencyEdge {
  source: string;
  target: string;
}

export function isExternal(node: string): boolean {
  return node.startsWith(EXTERNAL_PREFIX);
}

/**
 * Directed module graph. Nodes are repository paths plus `external:` markers.
 * Every traversal is iterative and tracks visited nodes, so cycles terminate.
 */
export class DependencyGraph {
  private readonly outgoing = new Map<string, Set<string>>();
  private readonly incoming = new Map<string, Set<string>>();

  public addNode(node: string): void {
    if (!this.outgoing.has(node)) this.outgoing.set(node, new Set());
    if (!this.incoming.has(node)) this.incoming.set(node, new Set());
  }

  /** Adding an existing edge is a no-op. */
  public addEdge(source: string, target: string): void {
    this.addNode(source);
    this.addNode(target);
    this.outgoing.get(source)?.add(target);
    this.incoming.get(target)?.add(source);
  }

  public hasNode(node: string): boolean {
    return this.outgoing.has(node);
  }

  public nodes(): string[] {
    return [...this.outgoing.keys()].sort(compareStrings);
  }

  public internalNodes(): string[] {
    return this.nodes().filter((node) => !isExternal(node));
  }

  public externalNodes(): string[] {
    return this.nodes().filter(isExternal);
  }

  public edges(): DependencyEdge[] {
    const edges: DependencyEdge[] = [];
    for (const source of this.nodes()) {
      for (const target of this.successors(source)) {
        edges.push({ source, target });
      }
    }
    return edges;
  }

  public successors(node: string): string[] {
    return [...(this.outgoing.get(node) ?? [])].sort(compareStrings);
  }

  public predecessors(node: string): string[] {
    return [...(this.incoming.get(node) ?? [])].sort(compareStrings);
  }

  public fanOut(node: string): number {
    return this.outgoing.get(node)?.size ?? 0;
  }

  public fanIn(node: string): number {
    return this.incoming.get(node)?.size ?? 0;
  }

  /** Everything `node` depends on, directly or transitively. */
  public reachableFrom(node: string): string[] {
    return this.walk(node, this.outgoing);
  }

  /** Everything that depends on `node`, directly or transitively. */
  public dependentsOf(node: string): string[] {
    return this.walk(node, this.incoming);
  }

  /**
   * Strongly connected components with more than one node, plus single
   * nodes that import themselves. Tarjan's algorithm on an explicit stack.
   */
  public cycles(): string[][] {
    const index = new Map<string, number>();
    const lowLink = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const components: string[][] = [];
    let counter = 0;

    for (const root of this.nodes()) {
      if (index.has(root)) continue;

      const frames: Array<{ node: string; successors: string[]; next: number }> = [];
      const enter = (node: string): void => {
        index.set(node, counter);
        lowLink.set(node, counter);
        counter += 1;
        stack.push(node);
        onStack.add(node);
        frames.push({ node, successors: this.successors(node), next: 0 });
      };
      enter(root);

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];
        if (frame.next < frame.successors.length) {
          const successor = frame.successors[frame.next];
          frame.next += 1;
          if (!index.has(successor)) {
            enter(successor);
          } else if (onStack.has(successor)) {
            lowLink.set(frame.node, Math.min(lowLink.get(frame.node) ?? 0, index.get(successor) ?? 0));
          }
          continue;
        }

        frames.pop();
        const parent = frames[frames.length - 1];
        if (parent) {
          lowLink.set(parent.node, Math.min(lowLink.get(parent.node) ?? 0, lowLink.get(frame.node) ?? 0));
        }

        if (lowLink.get(frame.node) !== index.get(frame.node)) continue;

        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.node);

        const selfLoop = component.length === 1 && (this.outgoing.get(frame.node)?.has(frame.node) ?? false);
        if (component.length > 1 || selfLoop) {
          components.push(component.sort(compareStrings));
        }
      }
    }

    return components.sort((a, b) => compareStrings(a[0] ?? "", b[0] ?? ""));
  }

  private walk(start: string, adjacency: Map<string, Set<string>>): string[] {
    const visited = new Set<string>([start]);
    const queue = [start];
    const reached: string[] = [];

    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      for (const next of adjacency.get(node) ?? []) {
        if (visited.has(next)) continue;
        visited.add(next);
        reached.push(next);
        queue.push(next);
      }
    }

    return reached.sort(compareStrings);
  }
}

/**
 * Builds the graph from each file's imports. Relative specifiers are
 * resolved against the known files; bare ones and unresolvable relative
 * ones become `external:` nodes.
 */
export function buildGraph(importsByFile: ReadonlyMap<string, readonly ImportReference[]>): DependencyGraph {
  const graph = new DependencyGraph();
  const knownFiles = new Set([...importsByFile.keys()].map(toPosixPath));

  for (const file of [...knownFiles].sort(compareStrings)) {
    graph.addNode(file);
  }

  for (const [file, imports] of importsByFile) {
    const source = toPosixPath(file);
    for (const reference of imports) {
      graph.addEdge(source, resolveImport(source, reference.specifier, knownFiles));
    }
  }

  return graph;
}

export function resolveImport(fromFile: string, specifier: string, knownFiles: ReadonlySet<string>): string {
  if (!isRelativeSpecifier(specifier)) {
    return `${EXTERNAL_PREFIX}${packageNameOf(specifier)}`;
  }

  const base = joinPath(dirnameOf(fromFile), specifier);
  for (const candidate of resolutionCandidates(base)) {
    if (knownFiles.has(candidate)) {
      return candidate;
    }
  }

  return `${EXTERNAL_PREFIX}${specifier}`;
}

function resolutionCandidates(base: string): string[] {
  const candidates = [base];

  const dot = base.lastIndexOf(".");
  const extension = dot > base.lastIndexOf("/") ? base.slice(dot) : "";
  for (const substitute of EXTENSION_SUBSTITUTES[extension] ?? []) {
    candidates.push(`${base.slice(0, dot)}${substitute}`);
  }

  for (const candidateExtension of RESOLVE_EXTENSIONS) {
    candidates.push(`${base}${candidateExtension}`);
  }
  for (const candidateExtension of RESOLVE_EXTENSIONS) {
    candidates.push(`${base}/index${candidateExtension}`);
  }

  return candidates;
}

function isRelativeSpecifier(specifier: string): boolean {
  return specifier === "." || specifier === ".." || specifier.startsWith("./") || specifier.startsWith("../");
}

/** `@scope/pkg/sub` → `@scope/pkg`; `pkg/sub` → `pkg`; `node:fs` stays. */
export function packageNameOf(specifier: string): string {
  const parts = specifier.split("/");
  if (specifier.startsWith("@") && parts.length >= 2) {
    return `${parts[0]}/${parts[1]}`;
  }
  return parts[0] ?? specifier;
}

function dirnameOf(path: string): string {
  const slash = path.lastIndexOf("/");
  return slash === -1 ? "" : path.slice(0, slash);
}

/** Joins and normalizes `.` and `..` segments; never climbs above the root. */
function joinPath(directory: string, relative: string): string {
  const segments: string[] = directory ? directory.split("/") : [];
  for (const segment of relative.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      segments.pop();
      continue;
    }
    segments.push(segment);
  }
  return segments.join("/");
}

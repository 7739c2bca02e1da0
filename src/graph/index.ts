export {
  DependencyGraph,
  type DependencyEdge,
  EXTERNAL_PREFIX,
  buildGraph,
  isExternal,
  packageNameOf,
  resolveImport,
} from "./dependency-graph.js";

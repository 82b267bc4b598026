/**
 * Dependency graph construction from resolved import edges
 */

import type { GraphEdge, ModuleKind, ModuleNode } from '../types/index.js';
import { DependencyGraph, compareIds } from './dependency-graph.js';

export interface GraphBuildInput {
  /** Relative paths of the analyzed files; each becomes a node (or joins its folder) */
  files: readonly string[];
  /** Edges from an importing file to a resolved module identifier */
  edges: readonly GraphEdge[];
  /** Size in bytes of every file in the snapshot */
  fileSizes: ReadonlyMap<string, number>;
  /** Module a file belongs to. Identity unless folders aggregate their files. */
  moduleOf?: (filePath: string) => string;
  /** Files a folder-module stands for */
  filesOf?: (moduleId: string) => string[];
}

interface MutableNode {
  id: string;
  imports: Set<string>;
  importedBy: Set<string>;
}

export function buildDependencyGraph(input: GraphBuildInput): DependencyGraph {
  const moduleOf = input.moduleOf ?? ((filePath: string) => filePath);
  const filesOf = input.filesOf ?? ((moduleId: string) => (input.fileSizes.has(moduleId) ? [moduleId] : []));
  const nodes = new Map<string, MutableNode>();

  const ensure = (id: string): MutableNode => {
    let node = nodes.get(id);
    if (!node) {
      node = { id, imports: new Set(), importedBy: new Set() };
      nodes.set(id, node);
    }
    return node;
  };

  for (const file of input.files) {
    ensure(moduleOf(file));
  }

  for (const edge of input.edges) {
    const from = moduleOf(edge.from);
    const to = edge.to;
    if (from === to) continue;
    // Sets collapse repeated imports between the same pair
    ensure(from).imports.add(to);
    ensure(to).importedBy.add(from);
  }

  const moduleCount = nodes.size;
  const built: ModuleNode[] = [];
  const edges: GraphEdge[] = [];

  for (const node of nodes.values()) {
    const kind: ModuleKind = input.fileSizes.has(node.id) ? 'file' : 'folder';
    const files = kind === 'file' ? [node.id] : filesOf(node.id).sort(compareIds);
    const size = files.reduce((sum, file) => sum + (input.fileSizes.get(file) ?? 0), 0);
    const impact = node.importedBy.size;

    built.push({
      id: node.id,
      kind,
      files,
      size,
      imports: Array.from(node.imports).sort(compareIds),
      importedBy: Array.from(node.importedBy).sort(compareIds),
      impact,
      centrality: moduleCount > 1 ? impact / (moduleCount - 1) : 0,
    });

    for (const to of node.imports) {
      edges.push({ from: node.id, to });
    }
  }

  return new DependencyGraph(built, edges);
}

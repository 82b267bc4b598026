/**
 * Immutable dependency graph snapshot
 */

import type { GraphEdge, ModuleNode } from '../types/index.js';

export interface DependencyGraphJSON {
  nodes: ModuleNode[];
  edges: GraphEdge[];
}

export class DependencyGraph {
  private readonly nodes: ReadonlyMap<string, ModuleNode>;
  private readonly edgeList: readonly GraphEdge[];

  constructor(nodes: Iterable<ModuleNode>, edges: Iterable<GraphEdge>) {
    const byId = new Map<string, ModuleNode>();
    for (const node of Array.from(nodes).sort((a, b) => compareIds(a.id, b.id))) {
      byId.set(node.id, Object.freeze({ ...node }));
    }
    this.nodes = byId;
    this.edgeList = Object.freeze(
      Array.from(edges)
        .filter(edge => byId.has(edge.from) && byId.has(edge.to))
        .sort((a, b) => compareIds(a.from, b.from) || compareIds(a.to, b.to))
    );
  }

  get size(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  hasModule(id: string): boolean {
    return this.nodes.has(id);
  }

  getModule(id: string): ModuleNode | undefined {
    return this.nodes.get(id);
  }

  /**
   * Module identifiers in lexical order
   */
  moduleIds(): string[] {
    return Array.from(this.nodes.keys());
  }

  modules(): ModuleNode[] {
    return Array.from(this.nodes.values());
  }

  edges(): GraphEdge[] {
    return [...this.edgeList];
  }

  dependenciesOf(id: string): readonly string[] {
    return this.nodes.get(id)?.imports ?? [];
  }

  dependentsOf(id: string): readonly string[] {
    return this.nodes.get(id)?.importedBy ?? [];
  }

  impactOf(id: string): number {
    return this.nodes.get(id)?.impact ?? 0;
  }

  /**
   * Modules by impact descending, ties by identifier
   */
  rankByImpact(): ModuleNode[] {
    return this.modules().sort((a, b) => b.impact - a.impact || compareIds(a.id, b.id));
  }

  /**
   * Modules with at least one edge endpoint, in lexical order
   */
  connectedModules(): string[] {
    return this.modules()
      .filter(node => node.imports.length > 0 || node.importedBy.length > 0)
      .map(node => node.id);
  }

  /**
   * Undirected neighbourhood of a module, excluding the module itself
   */
  neighborsOf(id: string): Set<string> {
    const node = this.nodes.get(id);
    return new Set(node ? [...node.imports, ...node.importedBy] : []);
  }

  toJSON(): DependencyGraphJSON {
    return { nodes: this.modules(), edges: this.edges() };
  }
}

/**
 * Plain code-unit comparison so ordering does not depend on locale
 */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

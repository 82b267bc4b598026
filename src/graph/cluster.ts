/**
 * Hierarchical clustering of modules by their distance in the dependency graph.
 *
 * Leaves are the modules that take part in at least one edge, in identifier
 * order. The distance between two modules is the length of the shortest
 * undirected path between them, or `disconnectedDistance` when no path
 * exists, so distinct modules are always at least 1 apart. Clusters are
 * merged agglomeratively with Lance-Williams updates; equal distances merge
 * the lowest index pair first.
 *
 * Cluster ids follow the usual linkage-matrix layout: leaves are 0..n-1 and
 * the k-th merge creates cluster n+k.
 */

import type { ClusterNode, Dendrogram, LinkageMethod, MergeStep, NamedCluster } from '../types/index.js';
import type { DependencyGraph } from './dependency-graph.js';
import { compareIds } from './dependency-graph.js';

export interface DendrogramOptions {
  linkage?: LinkageMethod;
  /** Distance between modules in different connected components */
  disconnectedDistance?: number;
}

export const DEFAULT_DISCONNECTED_DISTANCE = 1000;

export interface FlatClusterOptions {
  maxClusters: number;
  maxClusterSize: number;
  /** Groups whose summed centrality falls below this are dropped */
  impactThreshold: number;
}

export const DEFAULT_FLAT_CLUSTER_OPTIONS: FlatClusterOptions = {
  maxClusters: 25,
  maxClusterSize: 50,
  impactThreshold: 0,
};

export function buildDendrogram(graph: DependencyGraph, options: DendrogramOptions = {}): Dendrogram {
  const linkage = options.linkage ?? 'average';
  const leaves = graph.connectedModules();
  const n = leaves.length;

  if (n === 0) {
    return { linkage, leaves, merges: [], root: null };
  }

  const disconnected = options.disconnectedDistance ?? DEFAULT_DISCONNECTED_DISTANCE;
  const distances = new CondensedMatrix(n);
  for (let i = 0; i < n - 1; i++) {
    const hops = pathLengthsFrom(graph, leaves[i] ?? '');
    for (let j = i + 1; j < n; j++) {
      distances.set(i, j, hops.get(leaves[j] ?? '') ?? disconnected);
    }
  }

  const merges = agglomerate(distances, linkage);
  return { linkage, leaves, merges, root: assembleTree(leaves, merges) };
}

/**
 * Undirected hop counts from `source` to every module it can reach
 */
export function pathLengthsFrom(graph: DependencyGraph, source: string): Map<string, number> {
  const hops = new Map<string, number>([[source, 0]]);
  let frontier = [source];
  for (let depth = 1; frontier.length > 0; depth++) {
    const next: string[] = [];
    for (const id of frontier) {
      for (const neighbour of graph.neighborsOf(id)) {
        if (hops.has(neighbour)) continue;
        hops.set(neighbour, depth);
        next.push(neighbour);
      }
    }
    frontier = next;
  }
  return hops;
}

/**
 * Flat groups of module ids after applying every merge at or below `height`.
 * A height of 0 or less leaves each module on its own.
 */
export function cutDendrogram(dendrogram: Dendrogram, height: number): string[][] {
  return groupLeaves(dendrogram, merge => height > 0 && merge.height <= height);
}

/**
 * Find a cluster node by id (leaves 0..n-1, merges n..2n-2)
 */
export function findCluster(dendrogram: Dendrogram, clusterId: number): ClusterNode | undefined {
  const stack: ClusterNode[] = dendrogram.root ? [dendrogram.root] : [];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.id === clusterId) return node;
    // Children always have lower ids than their parent
    if (node.id > clusterId) stack.push(...node.children);
  }
  return undefined;
}

/**
 * Module ids under an explicit cluster id, or null when the id does not exist.
 */
export function selectCluster(dendrogram: Dendrogram, clusterId: number): string[] | null {
  const node = findCluster(dendrogram, clusterId);
  return node ? [...node.members] : null;
}

/**
 * Module ids in the group that contains `moduleId` once the tree is cut at
 * `height`. Null when the module is not a leaf of the dendrogram.
 */
export function selectClusterAt(dendrogram: Dendrogram, height: number, moduleId: string): string[] | null {
  if (!dendrogram.leaves.includes(moduleId)) return null;
  return cutDendrogram(dendrogram, height).find(group => group.includes(moduleId)) ?? null;
}

/**
 * Cut the tree into a bounded number of named groups and score each by the
 * summed centrality of its members.
 */
export function flatClusters(
  dendrogram: Dendrogram,
  graph: DependencyGraph,
  options: FlatClusterOptions = DEFAULT_FLAT_CLUSTER_OPTIONS
): NamedCluster[] {
  const n = dendrogram.leaves.length;
  if (n === 0) return [];

  const target = Math.max(2, Math.min(options.maxClusters, Math.ceil(n / Math.max(1, options.maxClusterSize))));
  const clusters: NamedCluster[] = [];
  const groups = groupLeaves(dendrogram, (_merge, step) => step < n - target);

  groups.forEach((modules, index) => {
    const fileCount = modules.reduce((sum, id) => sum + (graph.getModule(id)?.files.length ?? 0), 0);
    const aggregateImpact = modules.reduce((sum, id) => sum + (graph.getModule(id)?.centrality ?? 0), 0);
    if (aggregateImpact < options.impactThreshold) return;
    clusters.push({
      name: `Cluster ${index + 1}`,
      clusterIds: modules.map(id => dendrogram.leaves.indexOf(id)),
      modules,
      fileCount,
      aggregateImpact,
    });
  });

  return clusters.sort(
    (a, b) => b.aggregateImpact - a.aggregateImpact || b.fileCount - a.fileCount || compareIds(a.name, b.name)
  );
}

/**
 * Upper-triangle distance storage for n points
 */
class CondensedMatrix {
  private readonly values: Float64Array;

  constructor(readonly rows: number) {
    this.values = new Float64Array((rows * (rows - 1)) / 2);
  }

  get(i: number, j: number): number {
    return this.values[this.index(i, j)] ?? 0;
  }

  set(i: number, j: number, value: number): void {
    this.values[this.index(i, j)] = value;
  }

  private index(i: number, j: number): number {
    const [a, b] = i < j ? [i, j] : [j, i];
    return a * this.rows - (a * (a + 1)) / 2 + (b - a - 1);
  }
}

/**
 * Agglomerative merging with a per-row nearest-neighbour cache.
 *
 * Row i caches its nearest active row j > i. A merged cluster takes over the
 * lower of its two rows.
 */
function agglomerate(distances: CondensedMatrix, linkage: LinkageMethod): MergeStep[] {
  const n = distances.rows;
  const active = new Array<boolean>(n).fill(true);
  const clusterIdOf = Array.from({ length: n }, (_, i) => i);
  const sizeOf = new Array<number>(n).fill(1);
  const nearest = new Int32Array(n).fill(-1);
  const nearestDistance = new Float64Array(n).fill(Infinity);
  const merges: MergeStep[] = [];

  const refresh = (i: number): void => {
    nearest[i] = -1;
    nearestDistance[i] = Infinity;
    for (let j = i + 1; j < n; j++) {
      if (!active[j]) continue;
      const d = distances.get(i, j);
      if (d < (nearestDistance[i] ?? Infinity)) {
        nearest[i] = j;
        nearestDistance[i] = d;
      }
    }
  };

  for (let i = 0; i < n - 1; i++) refresh(i);

  for (let step = 0; step < n - 1; step++) {
    let a = -1;
    let best = Infinity;
    for (let i = 0; i < n; i++) {
      if (!active[i] || nearest[i] === -1) continue;
      const d = nearestDistance[i] ?? Infinity;
      if (a === -1 || d < best) {
        a = i;
        best = d;
      }
    }
    const b = nearest[a] ?? -1;
    if (a === -1 || b === -1) break;

    const sizeA = sizeOf[a] ?? 1;
    const sizeB = sizeOf[b] ?? 1;
    const idA = clusterIdOf[a] ?? a;
    const idB = clusterIdOf[b] ?? b;
    merges.push({ left: Math.min(idA, idB), right: Math.max(idA, idB), height: best, size: sizeA + sizeB });

    for (let k = 0; k < n; k++) {
      if (!active[k] || k === a || k === b) continue;
      distances.set(a, k, updatedDistance(linkage, distances.get(a, k), distances.get(b, k), sizeA, sizeB));
    }

    active[b] = false;
    sizeOf[a] = sizeA + sizeB;
    clusterIdOf[a] = n + step;

    refresh(a);
    for (let i = 0; i < n; i++) {
      if (!active[i] || i === a) continue;
      if (nearest[i] === a || nearest[i] === b) {
        refresh(i);
      } else if (i < a) {
        const d = distances.get(i, a);
        const current = nearestDistance[i] ?? Infinity;
        if (d < current || (d === current && a < (nearest[i] ?? n))) {
          nearest[i] = a;
          nearestDistance[i] = d;
        }
      }
    }
  }

  return merges;
}

function updatedDistance(linkage: LinkageMethod, toA: number, toB: number, sizeA: number, sizeB: number): number {
  switch (linkage) {
    case 'single':
      return Math.min(toA, toB);
    case 'complete':
      return Math.max(toA, toB);
    case 'average':
      return (sizeA * toA + sizeB * toB) / (sizeA + sizeB);
  }
}

function assembleTree(leaves: readonly string[], merges: readonly MergeStep[]): ClusterNode | null {
  const nodes: ClusterNode[] = leaves.map((id, index) => ({ id: index, members: [id], height: 0, children: [] }));

  merges.forEach((merge, step) => {
    const left = nodes[merge.left];
    const right = nodes[merge.right];
    if (!left || !right) return;
    nodes.push({
      id: leaves.length + step,
      members: [...left.members, ...right.members].sort(compareIds),
      height: merge.height,
      children: [left, right],
    });
  });

  return nodes[nodes.length - 1] ?? null;
}

function groupLeaves(
  dendrogram: Dendrogram,
  applies: (merge: MergeStep, step: number) => boolean
): string[][] {
  const n = dendrogram.leaves.length;
  const parent = Array.from({ length: 2 * n }, (_, i) => i);

  const find = (x: number): number => {
    let root = x;
    while ((parent[root] ?? root) !== root) root = parent[root] ?? root;
    return root;
  };

  dendrogram.merges.forEach((merge, step) => {
    if (!applies(merge, step)) return;
    const id = n + step;
    parent[find(merge.left)] = id;
    parent[find(merge.right)] = id;
  });

  const groups = new Map<number, string[]>();
  dendrogram.leaves.forEach((leaf, index) => {
    const root = find(index);
    const group = groups.get(root) ?? [];
    group.push(leaf);
    groups.set(root, group);
  });

  return Array.from(groups.values())
    .map(group => group.sort(compareIds))
    .sort((a, b) => compareIds(a[0] ?? '', b[0] ?? ''));
}

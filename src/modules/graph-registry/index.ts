/**
 * Graph Registry
 *
 * Holds the graph readers currently see. A new dataset is built off to the
 * side and swapped in only once the build succeeds; readers still holding the
 * previous graph keep a valid, frozen graph.
 */

import type { Graph } from '../graph-core';
import { buildGraph } from '../graph-builder';
import type { DatasetCollections } from '../../types/entities';

export class GraphRegistry {
  private graph: Graph;
  private swaps = 0;

  constructor(initial: Graph) {
    this.graph = initial;
  }

  static fromDataset(dataset: DatasetCollections): GraphRegistry {
    return new GraphRegistry(buildGraph(dataset));
  }

  current(): Graph {
    return this.graph;
  }

  /** Number of successful replacements since construction. */
  get generation(): number {
    return this.swaps;
  }

  /**
   * Build a graph from `dataset` and make it current. A failing build throws
   * and leaves the current graph untouched.
   */
  replace(dataset: DatasetCollections): Graph {
    let next: Graph;
    try {
      next = buildGraph(dataset);
    } catch (error) {
      console.error('❌ Graph rebuild failed, keeping current graph:', error);
      throw error;
    }

    this.graph = next;
    this.swaps += 1;
    console.log(`🔄 Graph replaced (generation ${this.swaps}): ${next.nodeCount} nodes, ${next.edgeCount} edges`);
    return next;
  }
}

export function createGraphRegistry(dataset: DatasetCollections): GraphRegistry {
  return GraphRegistry.fromDataset(dataset);
}

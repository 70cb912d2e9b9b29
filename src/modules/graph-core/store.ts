/**
 * GraphStore
 *
 * In-memory node/edge container. Node insertion order is preserved and is the
 * only tie-break source downstream, so nodes live in a Map keyed by id.
 * Mutation is only possible until freeze(); the builder freezes every graph
 * before handing it out. Nodes are frozen as they enter the store.
 */

import type { ConnectionType, GraphEdge } from '../../types/edges';
import type { EntityNode, GraphNode, NodeKind, NodeOfKind } from '../../types/nodes';
import { isNodeOfKind } from '../../types/nodes';
import { DuplicateNodeError, FrozenGraphError } from '../../errors';

/**
 * Read-only view of a built graph. Safe to share between any number of readers.
 */
export interface Graph {
  readonly nodeCount: number;
  readonly edgeCount: number;
  getNode(id: string): GraphNode | undefined;
  hasNode(id: string): boolean;
  nodes(): GraphNode[];
  nodesByKind<K extends NodeKind>(kind: K): NodeOfKind<K>[];
  edges(): GraphEdge[];
  outEdges(id: string, connectionType?: ConnectionType): GraphEdge[];
  inEdges(id: string, connectionType?: ConnectionType): GraphEdge[];
}

export class GraphStore implements Graph {
  private readonly nodeMap = new Map<string, GraphNode>();
  private readonly edgeList: GraphEdge[] = [];
  private readonly outgoing = new Map<string, GraphEdge[]>();
  private readonly incoming = new Map<string, GraphEdge[]>();
  private frozen = false;

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Insert a user, post or comment. A placeholder at the same id is promoted
   * in place and keeps its insertion position; any other existing node is a
   * DuplicateNodeError.
   */
  addNode(node: EntityNode): void {
    this.assertWritable('addNode');

    const existing = this.nodeMap.get(node.id);
    if (existing && existing.kind !== 'unknown') {
      throw new DuplicateNodeError(node.id);
    }
    this.nodeMap.set(node.id, freezeNode(node));
  }

  /**
   * Append a directed edge. Absent endpoints get an `unknown` placeholder.
   */
  addEdge(source: string, target: string, connectionType: ConnectionType): GraphEdge {
    this.assertWritable('addEdge');

    this.ensureNode(source);
    this.ensureNode(target);

    const edge: GraphEdge = { source, target, connectionType };
    this.edgeList.push(edge);
    this.index(this.outgoing, source, edge);
    this.index(this.incoming, target, edge);
    return edge;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodeMap.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  nodes(): GraphNode[] {
    return Array.from(this.nodeMap.values());
  }

  nodesByKind<K extends NodeKind>(kind: K): NodeOfKind<K>[] {
    const result: NodeOfKind<K>[] = [];
    for (const node of this.nodeMap.values()) {
      if (isNodeOfKind(node, kind)) result.push(node);
    }
    return result;
  }

  edges(): GraphEdge[] {
    return [...this.edgeList];
  }

  outEdges(id: string, connectionType?: ConnectionType): GraphEdge[] {
    return this.select(this.outgoing, id, connectionType);
  }

  inEdges(id: string, connectionType?: ConnectionType): GraphEdge[] {
    return this.select(this.incoming, id, connectionType);
  }

  // --- internals ---

  private ensureNode(id: string): void {
    if (!this.nodeMap.has(id)) {
      this.nodeMap.set(id, freezeNode({ kind: 'unknown', id }));
    }
  }

  private index(adjacency: Map<string, GraphEdge[]>, id: string, edge: GraphEdge): void {
    const list = adjacency.get(id);
    if (list) list.push(edge);
    else adjacency.set(id, [edge]);
  }

  private select(
    adjacency: Map<string, GraphEdge[]>,
    id: string,
    connectionType?: ConnectionType
  ): GraphEdge[] {
    const list = adjacency.get(id) ?? [];
    return connectionType ? list.filter((edge) => edge.connectionType === connectionType) : [...list];
  }

  private assertWritable(operation: string): void {
    if (this.frozen) throw new FrozenGraphError(operation);
  }
}

function freezeNode<T extends GraphNode>(node: T): T {
  for (const value of Object.values(node)) {
    if (Array.isArray(value)) Object.freeze(value);
  }
  Object.freeze(node);
  return node;
}

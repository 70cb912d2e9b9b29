/**
 * Graph Core: Schema Checks
 *
 * Structural invariants every built graph must satisfy, plus summary stats.
 */

import type { ConnectionType } from '../../types/edges';
import { EDGE_SCHEMA } from '../../types/edges';
import type { EntityKind, NodeKind } from '../../types/nodes';
import type { Graph } from './store';

export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  nodesByKind: Record<NodeKind, number>;
  edgesByType: Record<ConnectionType, number>;
}

export function validateEdge(connectionType: ConnectionType, fromKind: EntityKind, toKind: EntityKind): boolean {
  return EDGE_SCHEMA.some(
    (def) => def.type === connectionType && def.fromKind === fromKind && def.toKind === toKind
  );
}

/**
 * Re-check the post and comment invariants, and the endpoint kinds of every
 * edge against EDGE_SCHEMA. Edges touching a placeholder are not checked.
 * Returns one message per violation; a graph built from consistent
 * collections yields none.
 */
export function verifyGraph(graph: Graph): string[] {
  const violations: string[] = [];

  for (const post of graph.nodesByKind('post')) {
    const authored = graph.inEdges(post.id, 'authored');
    if (authored.length !== 1 || authored[0].source !== post.authorId) {
      violations.push(`post ${post.id}: expected one authored edge from ${post.authorId}, found ${authored.length}`);
    }

    const viewed = graph.inEdges(post.id, 'viewed');
    if (viewed.length !== post.viewedByIds.length) {
      violations.push(`post ${post.id}: expected ${post.viewedByIds.length} viewed edges, found ${viewed.length}`);
    }
  }

  for (const comment of graph.nodesByKind('comment')) {
    const authored = graph.inEdges(comment.id, 'authored');
    if (authored.length !== 1 || authored[0].source !== comment.authorId) {
      violations.push(
        `comment ${comment.id}: expected one authored edge from ${comment.authorId}, found ${authored.length}`
      );
    }

    const commentedOn = graph.outEdges(comment.id, 'commented_on');
    if (commentedOn.length !== 1 || commentedOn[0].target !== comment.postId) {
      violations.push(
        `comment ${comment.id}: expected one commented_on edge to ${comment.postId}, found ${commentedOn.length}`
      );
    }
  }

  for (const edge of graph.edges()) {
    const from = graph.getNode(edge.source);
    const to = graph.getNode(edge.target);
    if (!from || !to || from.kind === 'unknown' || to.kind === 'unknown') continue;

    if (!validateEdge(edge.connectionType, from.kind, to.kind)) {
      violations.push(
        `edge ${edge.source} -> ${edge.target}: ${edge.connectionType} not allowed from ${from.kind} to ${to.kind}`
      );
    }
  }

  return violations;
}

export function graphStats(graph: Graph): GraphStats {
  const nodesByKind: Record<NodeKind, number> = { user: 0, post: 0, comment: 0, unknown: 0 };
  const edgesByType: Record<ConnectionType, number> = { authored: 0, viewed: 0, commented_on: 0 };

  for (const node of graph.nodes()) nodesByKind[node.kind] += 1;
  for (const edge of graph.edges()) edgesByType[edge.connectionType] += 1;

  return {
    nodeCount: graph.nodeCount,
    edgeCount: graph.edgeCount,
    nodesByKind,
    edgesByType,
  };
}

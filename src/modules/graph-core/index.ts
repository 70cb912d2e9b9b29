/**
 * Graph Core Module
 *
 * Purpose: in-memory node/edge store, schema checks, graph stats
 * Dependencies: none
 *
 * Knows NOTHING about: raw input records, filtering, ranking
 */

export { GraphStore } from './store';
export type { Graph } from './store';

export { validateEdge, verifyGraph, graphStats } from './schema';
export type { GraphStats } from './schema';

// Re-export types for convenience
export type { GraphNode, NodeKind, NodeOfKind } from '../../types/nodes';
export type { ConnectionType, GraphEdge } from '../../types/edges';

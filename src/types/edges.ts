/**
 * Edge Type Definitions
 *
 * Edges are directed and labelled with a connection type.
 * The same ordered pair may carry several edges; nothing is deduplicated.
 */

import type { EntityKind } from './nodes';

export type ConnectionType = 'authored' | 'viewed' | 'commented_on';

export interface GraphEdge {
  readonly source: string;
  readonly target: string;
  readonly connectionType: ConnectionType;
}

export interface EdgeDefinition {
  type: ConnectionType;
  fromKind: EntityKind;
  toKind: EntityKind;
}

export const EDGE_SCHEMA: EdgeDefinition[] = [
  { type: 'authored', fromKind: 'user', toKind: 'post' },
  { type: 'authored', fromKind: 'user', toKind: 'comment' },
  { type: 'viewed', fromKind: 'user', toKind: 'post' },
  { type: 'commented_on', fromKind: 'comment', toKind: 'post' },
];

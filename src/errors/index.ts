/**
 * Error taxonomy.
 *
 * Build-time errors abort the whole build. Query-time errors abort only the
 * call that raised them; the graph stays usable.
 */

import type { EntityKind } from '../types/nodes';

export type SocialGraphErrorCode =
  | 'DUPLICATE_NODE'
  | 'MALFORMED_ENTITY'
  | 'FROZEN_GRAPH'
  | 'INVALID_RANKING_MODE'
  | 'INVALID_VIEWS_IMPORTANCE'
  | 'DATASET_LOAD';

export class SocialGraphError extends Error {
  constructor(
    readonly code: SocialGraphErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateNodeError extends SocialGraphError {
  constructor(readonly nodeId: string) {
    super('DUPLICATE_NODE', `Node already exists: ${nodeId}`);
  }
}

export class MalformedEntityError extends SocialGraphError {
  constructor(
    readonly entityKind: EntityKind,
    readonly entityId: string,
    readonly field: string,
    detail?: string
  ) {
    super(
      'MALFORMED_ENTITY',
      `Malformed ${entityKind} "${entityId}": field "${field}"${detail ? ` (${detail})` : ''}`
    );
  }
}

export class FrozenGraphError extends SocialGraphError {
  constructor(operation: string) {
    super('FROZEN_GRAPH', `Graph is read-only after build: ${operation} rejected`);
  }
}

export class InvalidRankingModeError extends SocialGraphError {
  constructor(readonly mode: string) {
    super('INVALID_RANKING_MODE', `Unknown ranking mode: "${mode}" (expected views, comments or mixed)`);
  }
}

export class InvalidViewsImportanceError extends SocialGraphError {
  constructor(readonly viewsImportance: number) {
    super('INVALID_VIEWS_IMPORTANCE', `viewsImportance must lie in [0, 1], got ${viewsImportance}`);
  }
}

export class DatasetLoadError extends SocialGraphError {
  constructor(
    readonly source: string,
    reason: string
  ) {
    super('DATASET_LOAD', `Cannot load dataset from ${source}: ${reason}`);
  }
}

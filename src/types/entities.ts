/**
 * Raw entity collections, as they arrive from a dataset file.
 * Keys of each collection are the entity ids.
 */

export interface RawUserRecord {
  username: string;
  attributes: {
    age: number;
    gender: string;
    location: string;
  };
  posts?: string[];
  comments?: string[];
  posts_read?: string[];
}

export interface RawPostRecord {
  author: string;
  content: string;
  creation_time: string | number;
  comments?: string[];
  viewed_by?: string[];
}

export interface RawCommentRecord {
  author: string;
  post_id: string;
  content: string;
  creation_time: string | number;
}

export interface RawDataset {
  users: Record<string, RawUserRecord>;
  posts: Record<string, RawPostRecord>;
  comments: Record<string, RawCommentRecord>;
}

/**
 * A collection keyed by entity id. Plain objects list integer-like keys
 * first in ascending order; pass a Map when such ids must keep input order.
 */
export type EntityCollection<T = unknown> = Record<string, T> | ReadonlyMap<string, T>;

/**
 * What the builder accepts: collections whose records are not yet validated.
 * A RawDataset is one of these.
 */
export interface DatasetCollections {
  users: EntityCollection;
  posts: EntityCollection;
  comments: EntityCollection;
}

/**
 * Graph Builder Module
 *
 * Purpose: turn the three raw entity collections into a frozen Graph
 * Dependencies: Graph Core, zod
 *
 * Insertion order is fixed: users, then posts, then comments, each in input
 * order. The store is local until every record is in, so a failing record
 * leaves nothing behind.
 */

import type { z } from 'zod';
import { GraphStore } from '../graph-core';
import type { Graph } from '../graph-core';
import { MalformedEntityError } from '../../errors';
import type { DatasetCollections, EntityCollection } from '../../types/entities';
import type { EntityKind } from '../../types/nodes';
import { RawCommentSchema, RawPostSchema, RawUserSchema } from './validators';

export { RawUserSchema, RawPostSchema, RawCommentSchema } from './validators';
export type { ParsedUser, ParsedPost, ParsedComment } from './validators';

export function buildGraph(dataset: DatasetCollections): Graph {
  const store = new GraphStore();

  for (const [id, raw] of entriesOf(dataset.users)) {
    const user = parseRecord(RawUserSchema, 'user', id, raw);
    store.addNode({
      kind: 'user',
      id,
      username: user.username,
      age: user.attributes.age,
      gender: user.attributes.gender,
      location: user.attributes.location,
      postIds: user.posts,
      commentIds: user.comments,
      postsReadIds: user.posts_read,
    });
  }

  for (const [id, raw] of entriesOf(dataset.posts)) {
    const post = parseRecord(RawPostSchema, 'post', id, raw);
    store.addNode({
      kind: 'post',
      id,
      authorId: post.author,
      content: post.content,
      creationTime: post.creation_time,
      commentIds: post.comments,
      viewedByIds: post.viewed_by,
    });

    store.addEdge(post.author, id, 'authored');
    for (const viewerId of post.viewed_by) {
      store.addEdge(viewerId, id, 'viewed');
    }
  }

  for (const [id, raw] of entriesOf(dataset.comments)) {
    const comment = parseRecord(RawCommentSchema, 'comment', id, raw);
    store.addNode({
      kind: 'comment',
      id,
      authorId: comment.author,
      postId: comment.post_id,
      content: comment.content,
      creationTime: comment.creation_time,
    });

    store.addEdge(comment.author, id, 'authored');
    store.addEdge(id, comment.post_id, 'commented_on');
  }

  return store.freeze();
}

function entriesOf(collection: EntityCollection): Array<[string, unknown]> {
  return collection instanceof Map ? Array.from(collection.entries()) : Object.entries(collection);
}

function parseRecord<S extends z.ZodTypeAny>(schema: S, kind: EntityKind, id: string, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'record';
    throw new MalformedEntityError(kind, id, field, issue?.message);
  }
  return result.data;
}

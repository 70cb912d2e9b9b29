/**
 * Post Filter Module
 *
 * Purpose: select posts by author attributes and content keywords
 * Dependencies: Graph Core
 */

import type { Graph } from '../graph-core';
import type { PostNode, UserAttributes } from '../../types/nodes';
import { authorAttributes } from '../../types/nodes';

export type AuthorFilter = Partial<UserAttributes>;

export interface PostFilterCriteria {
  /** A post passes if any keyword occurs in its content, ignoring case. */
  keywords?: readonly string[];
  /** A post passes if every defined entry equals its author's attribute. */
  authorFilter?: AuthorFilter;
}

/**
 * Posts passing every criterion, in post-insertion order.
 */
export function filterPostNodes(graph: Graph, criteria: PostFilterCriteria = {}): PostNode[] {
  const { keywords = [], authorFilter = {} } = criteria;
  const needles = keywords.map((keyword) => keyword.toLowerCase());
  const required = Object.entries(authorFilter).filter(([, value]) => value !== undefined);

  return graph.nodesByKind('post').filter((post) => {
    if (required.length > 0) {
      const attributes = new Map<string, unknown>(Object.entries(authorAttributes(graph.getNode(post.authorId))));
      if (!required.every(([name, value]) => attributes.get(name) === value)) return false;
    }

    if (needles.length > 0) {
      const content = post.content.toLowerCase();
      if (!needles.some((needle) => content.includes(needle))) return false;
    }

    return true;
  });
}

/**
 * Content strings of the matching posts, in post-insertion order.
 */
export function filterPosts(graph: Graph, criteria: PostFilterCriteria = {}): string[] {
  return filterPostNodes(graph, criteria).map((post) => post.content);
}

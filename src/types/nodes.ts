/**
 * Node Type Definitions
 *
 * Every node is a tagged variant sharing one id namespace.
 * An id names at most one User, Post or Comment.
 */

export type NodeKind = 'user' | 'post' | 'comment' | 'unknown';

/** Kinds that come from an input collection (everything but the placeholder). */
export type EntityKind = Exclude<NodeKind, 'unknown'>;

export type CreationTime = string | number;

export interface UserNode {
  readonly kind: 'user';
  readonly id: string;
  readonly username: string;
  readonly age: number;
  readonly gender: string;
  readonly location: string;
  readonly postIds: readonly string[];
  readonly commentIds: readonly string[];
  readonly postsReadIds: readonly string[];
}

export interface PostNode {
  readonly kind: 'post';
  readonly id: string;
  readonly authorId: string;
  readonly content: string;
  readonly creationTime: CreationTime;
  readonly commentIds: readonly string[];
  readonly viewedByIds: readonly string[];
}

export interface CommentNode {
  readonly kind: 'comment';
  readonly id: string;
  readonly authorId: string;
  readonly postId: string;
  readonly content: string;
  readonly creationTime: CreationTime;
}

/**
 * Placeholder created when an edge names an id that no collection defined.
 * Carries no attributes and never shows up in typed queries.
 */
export interface UnknownNode {
  readonly kind: 'unknown';
  readonly id: string;
}

export type EntityNode = UserNode | PostNode | CommentNode;
export type GraphNode = EntityNode | UnknownNode;

export type NodeOfKind<K extends NodeKind> = Extract<GraphNode, { kind: K }>;

/** Author attributes a post filter can match against. */
export interface UserAttributes {
  username: string;
  age: number;
  gender: string;
  location: string;
}

export function isNodeOfKind<K extends NodeKind>(node: GraphNode, kind: K): node is NodeOfKind<K> {
  return node.kind === kind;
}

/**
 * Display label for any node kind.
 */
export function nodeLabel(node: GraphNode): string {
  switch (node.kind) {
    case 'user':
      return node.username;
    case 'post':
    case 'comment':
      return node.content;
    case 'unknown':
      return node.id;
  }
}

/**
 * Attribute map of a post's author. Only users carry attributes;
 * placeholders, other node kinds and absent nodes yield an empty map.
 */
export function authorAttributes(node: GraphNode | undefined): Partial<UserAttributes> {
  if (!node || node.kind !== 'user') {
    return {};
  }
  const { username, age, gender, location } = node;
  return { username, age, gender, location };
}

/**
 * Ranker Module
 *
 * Purpose: score posts by engagement and return a stable top-N
 * Dependencies: Graph Core
 *
 * Scores come from the graph's edges: incoming `viewed` edges for views,
 * incoming `commented_on` edges for comments.
 */

import type { Graph } from '../graph-core';
import { InvalidRankingModeError, InvalidViewsImportanceError } from '../../errors';
import { mergeSortDescending } from './merge-sort';

export { mergeSortDescending } from './merge-sort';
export type { Scored } from './merge-sort';

export const RANKING_MODES = ['views', 'comments', 'mixed'] as const;
export type RankingMode = (typeof RANKING_MODES)[number];

export interface RankedPost {
  postId: string;
  score: number;
}

export interface RankOptions {
  /** Weight of views in `mixed` mode; comments get the remainder. */
  viewsImportance?: number;
  /** Maximum number of posts returned. */
  n?: number;
}

export const DEFAULT_VIEWS_IMPORTANCE = 0.5;
export const DEFAULT_TOP_N = 1;

export function isRankingMode(mode: string): mode is RankingMode {
  return RANKING_MODES.some((known) => known === mode);
}

/**
 * Every post with its score, in post-insertion order.
 */
export function scorePosts(
  graph: Graph,
  mode: string,
  viewsImportance = DEFAULT_VIEWS_IMPORTANCE
): RankedPost[] {
  if (!isRankingMode(mode)) {
    throw new InvalidRankingModeError(mode);
  }
  if (!Number.isFinite(viewsImportance) || viewsImportance < 0 || viewsImportance > 1) {
    throw new InvalidViewsImportanceError(viewsImportance);
  }

  const rankingMode: RankingMode = mode;

  return graph.nodesByKind('post').map((post) => ({
    postId: post.id,
    score: engagementScore(
      rankingMode,
      graph.inEdges(post.id, 'viewed').length,
      graph.inEdges(post.id, 'commented_on').length,
      viewsImportance
    ),
  }));
}

function engagementScore(mode: RankingMode, views: number, comments: number, viewsImportance: number): number {
  switch (mode) {
    case 'views':
      return views;
    case 'comments':
      return comments;
    case 'mixed':
      return (1 - viewsImportance) * comments + viewsImportance * views;
  }
}

/**
 * Top `n` posts by score, highest first. Equal scores keep insertion order.
 */
export function rankPosts(graph: Graph, mode: string, options: RankOptions = {}): RankedPost[] {
  const { viewsImportance = DEFAULT_VIEWS_IMPORTANCE, n = DEFAULT_TOP_N } = options;

  const candidates = scorePosts(graph, mode, viewsImportance);
  if (n <= 0) return [];

  return mergeSortDescending(candidates).slice(0, n);
}

/**
 * Post ids of a ranking, as a new array on every call.
 */
export function importantPostIds(ranked: readonly RankedPost[]): string[] {
  return ranked.map((entry) => entry.postId);
}

/**
 * Visualization Module
 *
 * Purpose: hand ranked and filtered results to rendering collaborators
 * Dependencies: Graph Core, Ranker
 *
 * Knows NOTHING about: canvases, layouts, image formats. The renderers are
 * supplied by the caller; this module only shapes what they receive.
 */

import type { Graph } from '../graph-core';
import type { ConnectionType } from '../../types/edges';
import type { NodeKind } from '../../types/nodes';
import { importantPostIds, rankPosts } from '../ranker';
import type { RankedPost, RankOptions } from '../ranker';

export interface Visualizer {
  /** `label` names the ranking mode behind the highlighted ids. */
  render(graph: Graph, highlightedPostIds: string[], label?: string): void;
}

export interface WordCloudGenerator {
  generate(text: string): void;
}

export interface HighlightOptions extends RankOptions {
  mode?: string;
}

export interface AnchorPosition {
  id: string;
  x: number;
  y: number;
}

export interface EdgeLabel {
  source: string;
  target: string;
  label: ConnectionType;
}

export const GRAPH_TITLE = 'Social Media Graph';

const NODE_COLORS: Record<NodeKind, string> = {
  user: 'green',
  post: 'blue',
  comment: 'magenta',
  unknown: 'gray',
};

export function nodeColor(kind: NodeKind): string {
  return NODE_COLORS[kind];
}

export function graphTitle(highlightCount: number, label?: string): string {
  if (highlightCount <= 0) return GRAPH_TITLE;

  const sortedBy = label ? ` Sorted by ${capitalize(label)}` : '';
  return `${GRAPH_TITLE}: ${highlightCount} Important Posts at the Top${sortedBy}`;
}

/**
 * Pinned positions for highlighted posts: one row along the top, centred.
 */
export function highlightAnchors(ids: readonly string[]): AnchorPosition[] {
  return ids.map((id, i) => ({
    id,
    x: 0.2 * i - 0.1 * ids.length,
    y: 2,
  }));
}

export function edgeLabels(graph: Graph): EdgeLabel[] {
  return graph.edges().map((edge) => ({
    source: edge.source,
    target: edge.target,
    label: edge.connectionType,
  }));
}

/**
 * Rank posts and pass the top ids to the visualizer. Each call hands over a
 * fresh id list.
 */
export function highlightImportantPosts(
  graph: Graph,
  visualizer: Visualizer,
  options: HighlightOptions = {}
): RankedPost[] {
  const { mode = 'mixed', ...rankOptions } = options;

  const ranking = rankPosts(graph, mode, rankOptions);
  visualizer.render(graph, importantPostIds(ranking), mode);
  return ranking;
}

export function renderWordCloud(contents: readonly string[], generator: WordCloudGenerator): string {
  const text = contents.join(' ');
  generator.generate(text);
  return text;
}

/**
 * Lowercased word counts in first-seen order.
 */
export function wordFrequencies(contents: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const content of contents) {
    for (const word of content.toLowerCase().split(/[^\p{L}\p{N}']+/u)) {
      if (!word) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  return counts;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * Social Graph Engine
 *
 * Models users, posts, comments and views as one directed graph, then answers
 * content-filtering and importance-ranking queries over it.
 *
 * A graph is built once and only read afterwards. New data means a new graph,
 * swapped in through the GraphRegistry.
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Configuration
export { config, loadConfig } from './config';
export type { AppConfig } from './config';

// Graph Core
export {
  GraphStore,
  validateEdge,
  verifyGraph,
  graphStats,
} from './modules/graph-core';
export type { Graph, GraphStats } from './modules/graph-core';

// Graph Builder
export { buildGraph, RawUserSchema, RawPostSchema, RawCommentSchema } from './modules/graph-builder';

// Post Filter
export { filterPosts, filterPostNodes } from './modules/post-filter';
export type { AuthorFilter, PostFilterCriteria } from './modules/post-filter';

// Ranker
export {
  rankPosts,
  scorePosts,
  importantPostIds,
  isRankingMode,
  mergeSortDescending,
  RANKING_MODES,
  DEFAULT_TOP_N,
  DEFAULT_VIEWS_IMPORTANCE,
} from './modules/ranker';
export type { RankedPost, RankingMode, RankOptions } from './modules/ranker';

// Visualization hand-off
export {
  nodeColor,
  graphTitle,
  highlightAnchors,
  edgeLabels,
  highlightImportantPosts,
  renderWordCloud,
  wordFrequencies,
} from './modules/visualization';
export type { Visualizer, WordCloudGenerator, HighlightOptions } from './modules/visualization';

// Dataset & Registry
export { loadDataset, parseDataset, DatasetSchema } from './modules/dataset';
export { GraphRegistry, createGraphRegistry } from './modules/graph-registry';

// MCP Service
export { McpService, McpRequestSchema, createMcpService } from './modules/mcp-service';
export type { McpTool, McpRequest, McpResponse, RankingDefaults } from './modules/mcp-service';

import { loadConfig } from './config';
import { loadDataset } from './modules/dataset';
import { createGraphRegistry } from './modules/graph-registry';
import { createMcpService } from './modules/mcp-service';

/**
 * Load the configured dataset and wire the registry and tool service.
 */
export function initSocialGraph(appConfig = loadConfig()) {
  const dataset = loadDataset(appConfig.datasetPath);
  const registry = createGraphRegistry(dataset);
  const mcpService = createMcpService(registry, appConfig.ranking);

  return {
    config: appConfig,
    registry,
    mcpService,
  };
}

export type SocialGraphApp = ReturnType<typeof initSocialGraph>;

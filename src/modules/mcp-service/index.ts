/**
 * MCP Service Module
 * JSON-RPC tool surface over the current graph: filter, rank, stats, reload.
 */

import { z } from 'zod';
import type { GraphRegistry } from '../graph-registry';
import { graphStats } from '../graph-core';
import { filterPosts } from '../post-filter';
import { importantPostIds, rankPosts, DEFAULT_TOP_N, DEFAULT_VIEWS_IMPORTANCE } from '../ranker';
import { DatasetSchema } from '../dataset';
import { SocialGraphError } from '../../errors';

export interface McpTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface McpRequest {
  jsonrpc: '2.0';
  id: string | number;
  method: string;
  params?: Record<string, unknown>;
}

export interface McpResponse {
  jsonrpc: '2.0';
  id: string | number;
  result?: unknown;
  error?: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export interface RankingDefaults {
  viewsImportance: number;
  topN: number;
}

export const JSON_RPC_ERRORS = {
  methodNotFound: -32601,
  invalidParams: -32602,
  internal: -32603,
  domain: -32000,
} as const;

export const McpRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

const ToolCallSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).default({}),
});

const FilterPostsArgsSchema = z.object({
  keywords: z.array(z.string()).optional(),
  authorFilter: z
    .object({
      username: z.string().optional(),
      age: z.number().optional(),
      gender: z.string().optional(),
      location: z.string().optional(),
    })
    .strict()
    .optional(),
});

const RankPostsArgsSchema = z.object({
  mode: z.string(),
  viewsImportance: z.number().optional(),
  n: z.number().int().optional(),
});

class UnknownToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
  }
}

const TOOLS: McpTool[] = [
  {
    name: 'filter_posts',
    description: 'List post contents whose author matches every attribute and whose content contains any keyword',
    inputSchema: {
      type: 'object',
      properties: {
        keywords: { type: 'array', items: { type: 'string' }, description: 'Case-insensitive substrings' },
        authorFilter: {
          type: 'object',
          properties: {
            username: { type: 'string' },
            age: { type: 'number' },
            gender: { type: 'string' },
            location: { type: 'string' },
          },
        },
      },
    },
  },
  {
    name: 'rank_posts',
    description: 'Rank posts by views, comments or a weighted mix of both',
    inputSchema: {
      type: 'object',
      properties: {
        mode: { type: 'string', enum: ['views', 'comments', 'mixed'] },
        viewsImportance: { type: 'number', minimum: 0, maximum: 1 },
        n: { type: 'number', description: 'Number of posts to return' },
      },
      required: ['mode'],
    },
  },
  {
    name: 'graph_stats',
    description: 'Node and edge counts of the current graph',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'load_dataset',
    description: 'Rebuild the graph from new users, posts and comments and make it current',
    inputSchema: {
      type: 'object',
      properties: {
        users: { type: 'object' },
        posts: { type: 'object' },
        comments: { type: 'object' },
      },
      required: ['users', 'posts', 'comments'],
    },
  },
];

export class McpService {
  private registry: GraphRegistry;
  private defaults: RankingDefaults;

  constructor(
    registry: GraphRegistry,
    defaults: RankingDefaults = { viewsImportance: DEFAULT_VIEWS_IMPORTANCE, topN: DEFAULT_TOP_N }
  ) {
    this.registry = registry;
    this.defaults = defaults;
  }

  async handleRequest(request: McpRequest): Promise<McpResponse> {
    try {
      switch (request.method) {
        case 'initialize': return this.handleInitialize(request);
        case 'tools/list': return { jsonrpc: '2.0', id: request.id, result: { tools: TOOLS } };
        case 'tools/call': return this.handleToolsCall(request);
        case 'ping': return { jsonrpc: '2.0', id: request.id, result: { pong: true } };
        default:
          return this.errorResponse(request, JSON_RPC_ERRORS.methodNotFound, `Method not found: ${request.method}`);
      }
    } catch (error) {
      if (error instanceof z.ZodError || error instanceof UnknownToolError) {
        return this.errorResponse(request, JSON_RPC_ERRORS.invalidParams, describeInvalidParams(error));
      }
      if (error instanceof SocialGraphError) {
        return this.errorResponse(request, JSON_RPC_ERRORS.domain, error.message, { code: error.code });
      }
      return this.errorResponse(
        request,
        JSON_RPC_ERRORS.internal,
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  private handleInitialize(request: McpRequest): McpResponse {
    return {
      jsonrpc: '2.0', id: request.id,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: { tools: {} },
        serverInfo: { name: 'social-graph-engine', version: '0.1.0' },
      },
    };
  }

  private handleToolsCall(request: McpRequest): McpResponse {
    const { name, arguments: args } = ToolCallSchema.parse(request.params ?? {});
    let result: unknown;

    switch (name) {
      case 'filter_posts': {
        const { keywords, authorFilter } = FilterPostsArgsSchema.parse(args);
        result = { posts: filterPosts(this.registry.current(), { keywords, authorFilter }) };
        break;
      }

      case 'rank_posts': {
        const { mode, viewsImportance, n } = RankPostsArgsSchema.parse(args);
        const ranking = rankPosts(this.registry.current(), mode, {
          viewsImportance: viewsImportance ?? this.defaults.viewsImportance,
          n: n ?? this.defaults.topN,
        });
        result = { ranking, postIds: importantPostIds(ranking) };
        break;
      }

      case 'graph_stats':
        result = { ...graphStats(this.registry.current()), generation: this.registry.generation };
        break;

      case 'load_dataset': {
        const graph = this.registry.replace(DatasetSchema.parse(args));
        result = { ...graphStats(graph), generation: this.registry.generation };
        break;
      }

      default:
        throw new UnknownToolError(name);
    }

    return { jsonrpc: '2.0', id: request.id, result: { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] } };
  }

  private errorResponse(request: McpRequest, code: number, message: string, data?: unknown): McpResponse {
    return { jsonrpc: '2.0', id: request.id, error: data === undefined ? { code, message } : { code, message, data } };
  }
}

function describeInvalidParams(error: z.ZodError | UnknownToolError): string {
  if (error instanceof UnknownToolError) return error.message;
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'params';
  return `Invalid params: ${where} ${issue?.message ?? ''}`.trim();
}

export function createMcpService(registry: GraphRegistry, defaults?: RankingDefaults): McpService {
  return new McpService(registry, defaults);
}

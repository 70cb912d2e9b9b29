import { filterPostNodes, filterPosts } from '../index';
import { buildGraph } from '../../graph-builder';
import type { Graph } from '../../graph-core';
import { scenarioDataset } from '../../graph-builder/__tests__/fixtures';

describe('Post Filter', () => {
  let graph: Graph;

  beforeEach(() => {
    graph = buildGraph(scenarioDataset());
  });

  it('should return every post in insertion order without criteria', () => {
    expect(filterPosts(graph)).toEqual(['hello world', 'hi']);
    expect(filterPosts(graph, { keywords: [], authorFilter: {} })).toEqual(['hello world', 'hi']);
  });

  describe('keywords', () => {
    it('should match a keyword as a substring', () => {
      expect(filterPosts(graph, { keywords: ['hello'] })).toEqual(['hello world']);
    });

    it('should ignore case', () => {
      expect(filterPosts(graph, { keywords: ['WORLD'] })).toEqual(['hello world']);
    });

    it('should keep a post when any keyword matches', () => {
      expect(filterPosts(graph, { keywords: ['world', 'hi'] })).toEqual(['hello world', 'hi']);
    });

    it('should return an empty list when nothing matches', () => {
      expect(filterPosts(graph, { keywords: ['sourdough'] })).toEqual([]);
    });
  });

  describe('author filter', () => {
    it('should keep posts whose author matches every attribute', () => {
      expect(filterPosts(graph, { authorFilter: { location: 'Lisbon' } })).toEqual(['hello world']);
      expect(filterPosts(graph, { authorFilter: { gender: 'male', location: 'Porto' } })).toEqual(['hi']);
    });

    it('should drop a post when one attribute differs', () => {
      expect(filterPosts(graph, { authorFilter: { gender: 'male', location: 'Lisbon' } })).toEqual([]);
    });

    it('should compare case-sensitively', () => {
      expect(filterPosts(graph, { authorFilter: { location: 'lisbon' } })).toEqual([]);
    });

    it('should compare numbers strictly', () => {
      expect(filterPosts(graph, { authorFilter: { age: 25 } })).toEqual(['hi']);
    });

    it('should ignore entries left undefined', () => {
      expect(filterPosts(graph, { authorFilter: { location: undefined } })).toEqual(['hello world', 'hi']);
    });

    it('should treat a placeholder author as having no attributes', () => {
      const dataset = scenarioDataset();
      dataset.posts.p2.author = 'ghost';
      const withGhost = buildGraph(dataset);

      expect(filterPosts(withGhost)).toEqual(['hello world', 'hi']);
      expect(filterPosts(withGhost, { authorFilter: { gender: 'male' } })).toEqual([]);
    });
  });

  it('should combine keywords and author filter', () => {
    expect(filterPosts(graph, { keywords: ['hello'], authorFilter: { location: 'Porto' } })).toEqual([]);
    expect(filterPosts(graph, { keywords: ['h'], authorFilter: { location: 'Porto' } })).toEqual(['hi']);
  });

  it('should expose the matching post nodes', () => {
    expect(filterPostNodes(graph, { keywords: ['hi'] }).map((post) => post.id)).toEqual(['p2']);
  });
});

import { GraphStore } from '../store';
import { DuplicateNodeError, FrozenGraphError } from '../../../errors';
import { authorAttributes, nodeLabel } from '../../../types/nodes';
import type { PostNode, UserNode } from '../../../types/nodes';
import { buildGraph } from '../../graph-builder';
import { filterPosts } from '../../post-filter';
import { verifyGraph } from '../schema';
import { scenarioDataset } from '../../graph-builder/__tests__/fixtures';

const alice: UserNode = {
  kind: 'user',
  id: 'alice',
  username: 'alice_w',
  age: 29,
  gender: 'female',
  location: 'Lisbon',
  postIds: ['p1'],
  commentIds: [],
  postsReadIds: [],
};

const post: PostNode = {
  kind: 'post',
  id: 'p1',
  authorId: 'alice',
  content: 'Sunrise hike',
  creationTime: '2024-03-02T07:15:00Z',
  commentIds: [],
  viewedByIds: [],
};

describe('GraphStore', () => {
  let store: GraphStore;

  beforeEach(() => {
    store = new GraphStore();
  });

  describe('addNode', () => {
    it('should reject a second node with the same id', () => {
      store.addNode(alice);

      expect(() => store.addNode({ ...post, id: 'alice' })).toThrow(DuplicateNodeError);
      expect(store.getNode('alice')).toBe(alice);
    });

    it('should replace a placeholder in place', () => {
      store.addEdge('x', 'p1', 'viewed');
      store.addNode(alice);
      store.addNode(post);

      expect(store.nodes().map((node) => node.id)).toEqual(['x', 'p1', 'alice']);
      expect(store.getNode('p1')).toBe(post);
    });
  });

  describe('addEdge', () => {
    it('should create unknown placeholders for absent endpoints', () => {
      store.addNode(alice);
      store.addEdge('alice', 'p9', 'authored');

      expect(store.getNode('p9')).toEqual({ kind: 'unknown', id: 'p9' });
      expect(store.nodesByKind('post')).toEqual([]);
      expect(store.nodesByKind('user')).toEqual([alice]);
    });

    it('should keep parallel edges', () => {
      store.addEdge('a', 'b', 'viewed');
      store.addEdge('a', 'b', 'viewed');
      store.addEdge('a', 'b', 'authored');

      expect(store.edgeCount).toBe(3);
      expect(store.outEdges('a')).toHaveLength(3);
      expect(store.inEdges('b', 'viewed')).toHaveLength(2);
      expect(store.inEdges('b', 'commented_on')).toEqual([]);
    });

    it('should index edges by direction', () => {
      store.addEdge('c1', 'p1', 'commented_on');

      expect(store.outEdges('c1')).toEqual([{ source: 'c1', target: 'p1', connectionType: 'commented_on' }]);
      expect(store.inEdges('c1')).toEqual([]);
      expect(store.outEdges('missing')).toEqual([]);
    });
  });

  describe('freeze', () => {
    it('should reject mutations once frozen', () => {
      store.addNode(alice);
      store.freeze();

      expect(() => store.addNode(post)).toThrow(FrozenGraphError);
      expect(() => store.addEdge('alice', 'p1', 'authored')).toThrow(FrozenGraphError);
      expect(store.nodeCount).toBe(1);
      expect(store.edgeCount).toBe(0);
    });
  });

  describe('frozen nodes', () => {
    it('should not let readers edit a node of a built graph', () => {
      const graph = buildGraph(scenarioDataset());
      const [p1] = graph.nodesByKind('post');

      expect(Object.isFrozen(p1)).toBe(true);
      expect(Reflect.set(p1, 'authorId', 'u2')).toBe(false);
      expect(Reflect.set(p1, 'content', 'rewritten')).toBe(false);
      expect(Reflect.set(p1.viewedByIds, 0, 'u1')).toBe(false);
      expect(p1.authorId).toBe('u1');
      expect(verifyGraph(graph)).toEqual([]);
      expect(filterPosts(graph)).toEqual(['hello world', 'hi']);
    });

    it('should freeze placeholders as well', () => {
      store.addEdge('ghost', 'p1', 'viewed');

      expect(Object.isFrozen(store.getNode('ghost'))).toBe(true);
    });
  });

  describe('reads', () => {
    it('should hand out copies of its lists', () => {
      store.addEdge('a', 'b', 'viewed');

      store.edges().pop();
      store.inEdges('b').pop();
      store.nodes().pop();

      expect(store.edgeCount).toBe(1);
      expect(store.inEdges('b')).toHaveLength(1);
      expect(store.nodeCount).toBe(2);
    });
  });
});

describe('node accessors', () => {
  it('should label each kind', () => {
    expect(nodeLabel(alice)).toBe('alice_w');
    expect(nodeLabel(post)).toBe('Sunrise hike');
    expect(nodeLabel({ kind: 'unknown', id: 'ghost' })).toBe('ghost');
  });

  it('should expose attributes for users only', () => {
    expect(authorAttributes(alice)).toEqual({ username: 'alice_w', age: 29, gender: 'female', location: 'Lisbon' });
    expect(authorAttributes(post)).toEqual({});
    expect(authorAttributes({ kind: 'unknown', id: 'ghost' })).toEqual({});
    expect(authorAttributes(undefined)).toEqual({});
  });
});

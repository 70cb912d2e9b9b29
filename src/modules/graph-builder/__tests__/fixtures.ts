import type { RawDataset } from '../../../types/entities';

/**
 * Two users, two posts, one comment. u2 viewed p1 and commented on it.
 */
export function scenarioDataset(): RawDataset {
  return {
    users: {
      u1: { username: 'user-one', attributes: { age: 30, gender: 'female', location: 'Lisbon' } },
      u2: { username: 'user-two', attributes: { age: 25, gender: 'male', location: 'Porto' } },
    },
    posts: {
      p1: { author: 'u1', content: 'hello world', creation_time: '2024-01-01T10:00:00Z', viewed_by: ['u2'] },
      p2: { author: 'u2', content: 'hi', creation_time: '2024-01-01T11:00:00Z', viewed_by: [] },
    },
    comments: {
      c1: { author: 'u2', post_id: 'p1', content: 'nice', creation_time: '2024-01-01T12:00:00Z' },
    },
  };
}

/**
 * Three posts whose view and comment orders disagree:
 * views a=1 b=3 c=2, comments a=2 b=0 c=1.
 */
export function engagementDataset(): RawDataset {
  const user = (name: string) => ({ username: name, attributes: { age: 20, gender: 'female', location: 'Faro' } });
  const comment = (postId: string) => ({ author: 'v1', post_id: postId, content: 'ok', creation_time: 0 });

  return {
    users: { v1: user('v1'), v2: user('v2'), v3: user('v3') },
    posts: {
      a: { author: 'v1', content: 'post a', creation_time: 1, viewed_by: ['v1'] },
      b: { author: 'v2', content: 'post b', creation_time: 2, viewed_by: ['v1', 'v2', 'v3'] },
      c: { author: 'v3', content: 'post c', creation_time: 3, viewed_by: ['v1', 'v2'] },
    },
    comments: { ca1: comment('a'), ca2: comment('a'), cc1: comment('c') },
  };
}

/** The value thrown by `fn`, or undefined when it returns normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

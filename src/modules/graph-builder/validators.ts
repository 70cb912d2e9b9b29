import { z } from 'zod';

const IdListSchema = z.array(z.string()).default([]);
const CreationTimeSchema = z.union([z.string(), z.number()]);

export const RawUserSchema = z.object({
  username: z.string(),
  attributes: z.object({
    age: z.number(),
    gender: z.string(),
    location: z.string(),
  }),
  posts: IdListSchema,
  comments: IdListSchema,
  posts_read: IdListSchema,
});

export const RawPostSchema = z.object({
  author: z.string(),
  content: z.string(),
  creation_time: CreationTimeSchema,
  comments: IdListSchema,
  viewed_by: IdListSchema,
});

export const RawCommentSchema = z.object({
  author: z.string(),
  post_id: z.string(),
  content: z.string(),
  creation_time: CreationTimeSchema,
});

export type ParsedUser = z.infer<typeof RawUserSchema>;
export type ParsedPost = z.infer<typeof RawPostSchema>;
export type ParsedComment = z.infer<typeof RawCommentSchema>;

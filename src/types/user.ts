import { z } from 'zod';
import { dedupe } from '../shared/utils.js';

const keySet = z.array(z.string().min(1)).transform(dedupe);

export const userSchema = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
  email: z.string().email().nullable(),
  profilePicture: z.string(),
  bio: z.string(),
  followers: keySet,
  following: keySet,
  likedBooks: keySet,
  savedBooks: keySet,
  publicBooks: keySet,
  privateBooks: keySet,
  createdAt: z.string().datetime(),
});

export type User = z.infer<typeof userSchema>;

export interface PublicUserProfile {
  username: string;
  profilePicture: string;
  bio: string;
  publicBooks: string[];
}

export const userUpdateSchema = z
  .object({
    username: z
      .string()
      .trim()
      .min(3)
      .max(32)
      .regex(/^[a-zA-Z0-9_.-]+$/, 'username may only contain letters, digits, _ . -'),
    bio: z.string().max(500),
    profilePicture: z.string().url(),
  })
  .partial();

export type UserUpdate = z.infer<typeof userUpdateSchema>;

import { z } from 'zod';

// Response shapes of the Immich REST API, reduced to the fields used here.

export const UserSchema = z.object({
  id: z.string(),
  email: z.string(),
  name: z.string(),
});

export const AssetSchema = z.object({
  id: z.string(),
  ownerId: z.string(),
  originalFileName: z.string(),
  type: z.string().optional(),
  fileCreatedAt: z.string().optional(),
  localDateTime: z.string().optional(),
  tags: z.array(z.object({ id: z.string(), name: z.string() })).optional(),
});

export const AlbumSchema = z.object({
  id: z.string(),
  albumName: z.string(),
  description: z.string().nullish(),
  ownerId: z.string(),
  albumUsers: z
    .array(z.object({ user: z.object({ id: z.string() }), role: z.string().optional() }))
    .default([]),
  assets: z.array(z.object({ id: z.string() })).default([]),
  assetCount: z.number().optional(),
});

export const TagSchema = z.object({
  id: z.string(),
  name: z.string(),
  value: z.string().optional(),
});

export const BulkIdResultSchema = z.object({
  id: z.string(),
  success: z.boolean(),
  error: z.string().nullish(),
});

export const SearchResultSchema = z.object({
  assets: z.object({
    items: z.array(AssetSchema),
    total: z.number().optional(),
    nextPage: z.string().nullish(),
  }),
});

export const ErrorBodySchema = z.object({
  message: z.union([z.string(), z.array(z.string())]).optional(),
  error: z.string().optional(),
});

export type ImmichUser = z.infer<typeof UserSchema>;
export type ImmichAsset = z.infer<typeof AssetSchema>;
export type ImmichAlbum = z.infer<typeof AlbumSchema>;
export type ImmichTag = z.infer<typeof TagSchema>;
export type BulkIdResult = z.infer<typeof BulkIdResultSchema>;

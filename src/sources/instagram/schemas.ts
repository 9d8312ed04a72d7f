/**
 * Instagram hashtag page data (window._sharedData) schemas
 */

import { z } from "zod";

export const instagramPostSchema = z.object({
  owner: z.object({ username: z.string().optional() }).default({}),
  edge_media_to_caption: z
    .object({
      edges: z.array(z.object({ node: z.object({ text: z.string().optional() }) })).default([]),
    })
    .optional(),
});

export const instagramSharedDataSchema = z.object({
  entry_data: z.object({
    TagPage: z
      .array(
        z.object({
          graphql: z.object({
            hashtag: z.object({
              edge_hashtag_to_media: z.object({
                edges: z.array(z.object({ node: instagramPostSchema })).default([]),
              }),
            }),
          }),
        }),
      )
      .min(1),
  }),
});

export type InstagramPost = z.infer<typeof instagramPostSchema>;

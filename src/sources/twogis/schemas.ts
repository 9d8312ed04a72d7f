/**
 * 2GIS Catalog API response schemas (items search)
 *
 * Only the fields the adapter reads are declared; unknown keys pass.
 */

import { z } from "zod";

const contactSchema = z.object({
  type: z.string(),
  value: z.string().optional(),
  text: z.string().optional(),
  url: z.string().optional(),
});

const admDivSchema = z.object({
  type: z.string(),
  name: z.string().optional(),
});

export const twoGisItemSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  address_name: z.string().optional(),
  full_name: z.string().optional(),
  address: z
    .object({
      name: z.string().optional(),
      components: z.array(admDivSchema).optional(),
    })
    .optional(),
  adm_div: z.array(admDivSchema).optional(),
  point: z.object({ lat: z.number(), lon: z.number() }).optional(),
  contact_groups: z.array(z.object({ contacts: z.array(contactSchema).default([]) })).optional(),
  rubrics: z.array(z.object({ name: z.string() })).optional(),
  reviews: z
    .object({
      general_rating: z.number().optional(),
      rating: z.number().optional(),
      general_review_count: z.number().optional(),
      total: z.number().optional(),
    })
    .optional(),
  link: z.string().optional(),
});

export const twoGisResponseSchema = z.object({
  meta: z.object({
    code: z.number(),
    error: z.object({ type: z.string().optional(), message: z.string().optional() }).optional(),
  }),
  result: z
    .object({
      total: z.number().optional(),
      items: z.array(twoGisItemSchema).default([]),
    })
    .optional(),
});

export type TwoGisItem = z.infer<typeof twoGisItemSchema>;
export type TwoGisResponse = z.infer<typeof twoGisResponseSchema>;

/**
 * Yandex org-search API response schemas (GeoJSON FeatureCollection)
 */

import { z } from "zod";

export const yandexFeatureSchema = z.object({
  geometry: z
    .object({
      coordinates: z.array(z.number()).optional(),
    })
    .optional(),
  properties: z.object({
    name: z.string().optional(),
    description: z.string().optional(),
    CompanyMetaData: z
      .object({
        id: z.string().optional(),
        name: z.string().optional(),
        address: z.string().optional(),
        url: z.string().optional(),
        Phones: z.array(z.object({ formatted: z.string().optional() })).optional(),
        Categories: z.array(z.object({ name: z.string().optional() })).optional(),
      })
      .optional(),
  }),
});

export const yandexResponseSchema = z.object({
  features: z.array(yandexFeatureSchema).default([]),
});

export type YandexFeature = z.infer<typeof yandexFeatureSchema>;

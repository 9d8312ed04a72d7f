/**
 * EGR (Unified State Register of Legal Entities) search response schemas
 */

import { z } from "zod";

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

export const egrItemSchema = z.object({
  vnaim: optionalText,
  naimk: optionalText,
  vnp: optionalText,
  ngrn: optionalText,
  address: optionalText,
  vpadres: optionalText,
  voblast: optionalText,
  region: optionalText,
  vorgf: optionalText,
  oked: z.union([z.string(), z.array(z.string())]).nullish(),
});

export const egrResponseSchema = z.object({
  data: z
    .object({
      items: z.array(egrItemSchema).default([]),
    })
    .default({}),
});

export type EgrItem = z.infer<typeof egrItemSchema>;

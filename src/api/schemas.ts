// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST SCHEMAS — Validation for HTTP Bodies and Params
// ═══════════════════════════════════════════════════════════════════════════════
//
// Field names follow the wire format (snake_case). Missing fields take the
// defaults shown; an absent body is treated as {}.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

export const SectorSchema = z.string().min(1).max(200);

export const TopicContentBodySchema = z.object({
  question: z.string().max(10_000).default(''),
  sector: z.string().max(200).default(''),
  offline_mode: z.boolean().default(false),
});

export type TopicContentBody = z.infer<typeof TopicContentBodySchema>;

export const SearchPreferencesSchema = z.object({
  sectors: z.array(z.string()).optional(),
  recencyBoost: z.boolean().optional(),
}).passthrough();

export const AdvancedSearchBodySchema = z.object({
  query: z.string().max(1000).default(''),
  preferences: SearchPreferencesSchema.nullable().default(null),
});

export type AdvancedSearchBody = z.infer<typeof AdvancedSearchBodySchema>;

export const ProgressBodySchema = z.object({
  sector: SectorSchema,
  performance: z.number().finite(),
  notes: z.string().max(5000).optional(),
  last_study_date: z.string().datetime().optional(),
});

export type ProgressBody = z.infer<typeof ProgressBodySchema>;

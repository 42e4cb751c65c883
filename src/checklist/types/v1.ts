/**
 * Legacy (v1) Checklist Schema
 *
 * A v1 checklist is a JSON document with a flat `items` array. Every item key
 * is optional; unknown keys pass through untouched and are ignored by the
 * converter. Known keys must hold strings: anything else aborts the whole
 * input file during conversion.
 *
 * Consumers: engine/generate-v2.ts
 */

import { z } from 'zod';

/** Single v1 recommendation item */
export const V1ItemSchema = z
  .object({
    guid: z.string().optional(),
    text: z.string().optional(),
    description: z.string().optional(),
    /** WAF pillar, e.g. "Reliability" */
    waf: z.string().optional(),
    /** "High" | "Medium" | "Low", any casing */
    severity: z.string().optional(),
    category: z.string().optional(),
    subcategory: z.string().optional(),
    id: z.string().optional(),
    /** Azure Resource Graph query */
    graph: z.string().optional(),
    link: z.string().optional(),
    training: z.string().optional(),
    source: z.string().optional(),
    sourceType: z.string().optional(),
    sourceFile: z.string().optional(),
    service: z.string().optional(),
    recommendationResourceType: z.string().optional(),
  })
  .passthrough();

export type V1Item = z.infer<typeof V1ItemSchema>;

/** Top-level v1 document. Other top-level keys (metadata, categories, ...) are ignored. */
export const V1ChecklistSchema = z
  .object({
    items: z.array(V1ItemSchema),
  })
  .passthrough();

export type V1Checklist = z.infer<typeof V1ChecklistSchema>;

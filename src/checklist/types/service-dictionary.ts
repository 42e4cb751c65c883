/**
 * Service Dictionary
 *
 * Maps the aliases a service goes by in v1 checklists ("VM", "Virtual
 * Machine", ...) to its canonical name and ARM resource type. Entry order
 * matters: lookups return the first entry whose aliases match.
 */

import { z } from 'zod';

export const ServiceDictionaryEntrySchema = z
  .object({
    names: z.array(z.string()),
    service: z.string(),
    arm: z.string(),
  })
  .passthrough();

export const ServiceDictionarySchema = z.array(ServiceDictionaryEntrySchema);

export type ServiceDictionaryEntry = z.infer<typeof ServiceDictionaryEntrySchema>;
export type ServiceDictionary = z.infer<typeof ServiceDictionarySchema>;

/** Extra static labels merged into every v2 record */
export const ExtraLabelsSchema = z.record(z.string(), z.string());

export type ExtraLabels = z.infer<typeof ExtraLabelsSchema>;

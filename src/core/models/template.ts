/**
 * Recording template: a form attached to recordings, defined on the device.
 */

import { z } from 'zod';

const TemplateItemSchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  widget_type: z.string().default('TEXT'),
  input_type: z.string().default('any'),
  required: z.boolean().default(false),
  choices: z.array(z.string()).nullable().optional(),
  help_text: z.string().nullable().optional(),
});

export const TemplateDefinitionSchema = z.object({
  id: z.string(),
  name: z.string().default(''),
  description: z.string().nullable().optional(),
  items: z.array(TemplateItemSchema).default([]),
});

/** Answers keyed by item id; every answer is a list of strings */
export const TemplateDataSchema = z.record(z.string(), z.array(z.string()));

export type TemplateItem = z.infer<typeof TemplateItemSchema>;
export type TemplateDefinition = z.infer<typeof TemplateDefinitionSchema>;
export type TemplateData = z.infer<typeof TemplateDataSchema>;

export interface Template {
  readonly definition: TemplateDefinition;
  readonly data: TemplateData;
}

/**
 * Item ids a template requires but `data` leaves empty.
 */
export function missingRequiredItems(definition: TemplateDefinition, data: TemplateData): string[] {
  return definition.items
    .filter((item) => item.required)
    .filter((item) => (data[item.id] ?? []).every((answer) => answer.trim() === ''))
    .map((item) => item.id);
}

import { z } from 'zod';

const actionListSchema = z.array(z.record(z.unknown()));

// Accepts a single mapping as well as a list, like the host's ensure_list
const ensureList = z
  .union([z.record(z.unknown()), actionListSchema])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const automationRequestSchema = z
  .object({
    alias: z.string().trim().min(1),
    description: z.string().optional(),
    mode: z.string().default('single'),
    filename: z.string().optional(),
    overwrite: z.boolean().default(false),
    trigger: ensureList,
    condition: ensureList.optional(),
    action: ensureList,
  })
  .passthrough();

export const packageOptionsSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().optional(),
  overwrite: z.boolean().default(false),
  include_example: z.boolean().default(true),
  include_scripts: z.boolean().default(false),
  include_scenes: z.boolean().default(false),
  include_blueprint: z.boolean().default(false),
  blueprint_domain: z.enum(['automation', 'script']).default('automation'),
  automations: z.array(z.record(z.unknown())).optional(),
});

export type AutomationRequestInput = z.input<typeof automationRequestSchema>;
export type PackageOptionsInput = z.input<typeof packageOptionsSchema>;

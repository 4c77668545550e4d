import { z } from 'zod';

const extensionKey = z
  .string()
  .regex(/^\.?[A-Za-z0-9_+-]+$/, 'Extension keys look like ".py" or "py"');

export const lineTagConfigSchema = z
  .object({
    delimiters: z.record(extensionKey, z.string().min(1).max(8)).optional(),
    column: z.number().int().min(40).max(200).optional(),
    marker_offset: z.number().int().min(0).max(200).optional(),
    removal_keywords: z.array(z.string().min(1).max(32)).min(1).max(50).optional(),
    base_branch: z.string().min(1).max(255).optional(),
    fallback_branch: z.string().min(1).max(255).optional(),
    hook_command: z.string().min(1).max(500).optional(),
  })
  .strict();

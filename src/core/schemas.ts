// Zod schemas for command-line options and hosting settings

import { z } from 'zod';

/**
 * Flags accepted by the addlinks command
 */
export const LinkerOptionsSchema = z.object({
  markdown: z.boolean().default(false),
  permanent: z.boolean().default(false),
  list: z.boolean().default(false),
  verbose: z.boolean().default(false),
  man: z.boolean().default(false)
}).strict();

export type LinkerOptions = z.infer<typeof LinkerOptionsSchema>;

/**
 * Base URL of the hosted repository, e.g. https://github.com/owner/repo
 */
export const HostingRootSchema = z.string()
  .url('Hosting root must be an absolute URL')
  .regex(/^https?:\/\/[^/]+\/[^/]+\/[^/]+$/, 'Hosting root must look like <scheme>://<host>/<owner>/<repo>');

/**
 * Validate the parsed command-line flags
 */
export function safeValidateLinkerOptions(data: unknown) {
  return LinkerOptionsSchema.safeParse(data);
}

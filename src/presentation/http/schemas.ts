import { z } from 'zod';

export const zStreamDescriptorBody = z.object({
  name: z.string().default(''),
  title: z.string().default(''),
  url: z.string().default(''),
  infoHash: z.string().optional(),
  // Out-of-range positions are left to the file selector
  fileIndex: z.number().int().optional(),
  sources: z.array(z.string()).default([])
});

const zEpisodeNumber = z.coerce.number().int().min(1);

export const zStreamsQuery = z.object({
  season: zEpisodeNumber.optional(),
  episode: zEpisodeNumber.optional()
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

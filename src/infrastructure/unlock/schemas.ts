import { z } from 'zod';

export const zAddMagnetResponse = z.object({
  id: z.string().optional()
}).passthrough();

export const zTorrentInfoResponse = z.object({
  status: z.string().optional(),
  files: z.array(z.object({
    id: z.number().int(),
    path: z.string(),
    bytes: z.number()
  }).passthrough()).nullish(),
  links: z.array(z.string()).nullish()
}).passthrough();

export const zUnrestrictResponse = z.object({
  download: z.string().optional()
}).passthrough();

export type TorrentInfoResponse = z.infer<typeof zTorrentInfoResponse>;

import { z } from 'zod';

export const zCatalogResponse = z.object({
  metas: z.array(z.object({
    id: z.string().nullish(),
    name: z.string().nullish(),
    type: z.string().nullish(),
    year: z.unknown(),
    poster: z.string().nullish()
  }).passthrough()).nullish()
}).passthrough();

export const zSeriesMetaResponse = z.object({
  meta: z.object({
    videos: z.array(z.object({
      season: z.number().nullish(),
      episode: z.number().nullish()
    }).passthrough()).nullish()
  }).passthrough().nullish()
}).passthrough();

export const zStreamsResponse = z.object({
  streams: z.array(z.object({
    name: z.string().nullish(),
    title: z.string().nullish(),
    url: z.string().nullish(),
    infoHash: z.string().nullish(),
    fileIdx: z.unknown(),
    sources: z.array(z.string()).nullish()
  }).passthrough()).nullish()
}).passthrough();

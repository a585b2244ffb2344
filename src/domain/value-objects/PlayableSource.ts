/**
 * Canonical playable reference derived from a stream descriptor
 * Produced once per resolution and matched exhaustively downstream
 */

import type { StreamDescriptor } from '../entities';

export type PlayableSource =
  | { kind: 'direct-url'; url: string }
  | { kind: 'magnet-uri'; magnet: string }
  // magnet is '' when the descriptor carries no info-hash
  | { kind: 'hash-synthesized'; magnet: string };

export type PlayableSourceKind = PlayableSource['kind'];

const TRACKER_PREFIX = 'tracker:';
const MAGNET_PREFIX = 'magnet:?xt=urn:btih:';
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Form-style query escaping: everything but [A-Za-z0-9-_.~] is percent-encoded, spaces become '+'
 * Unpaired surrogates are encoded as U+FFFD
 */
export function escapeQueryValue(value: string): string {
  return encodeURIComponent(value.replace(LONE_SURROGATE, '\uFFFD'))
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * Builds a magnet URI from the descriptor's info-hash and `tracker:` sources
 * Trackers keep first-seen order and their own case; duplicates are dropped
 * @returns Magnet URI, or '' when there is no info-hash
 */
export function buildMagnet(descriptor: Pick<StreamDescriptor, 'infoHash' | 'sources'>): string {
  const infoHash = descriptor.infoHash ?? '';
  if (infoHash === '') {
    return '';
  }

  let magnet = MAGNET_PREFIX + infoHash.toLowerCase();
  const seen = new Set<string>();

  for (const source of descriptor.sources) {
    if (!source.startsWith(TRACKER_PREFIX)) {
      continue;
    }

    const tracker = source.slice(TRACKER_PREFIX.length).trim();
    if (tracker === '' || seen.has(tracker)) {
      continue;
    }

    seen.add(tracker);
    magnet += `&tr=${escapeQueryValue(tracker)}`;
  }

  return magnet;
}

export function classifyDescriptor(descriptor: StreamDescriptor): PlayableSource {
  const lowered = descriptor.url.toLowerCase();

  if (lowered.startsWith('http')) {
    return { kind: 'direct-url', url: descriptor.url };
  }

  if (lowered.startsWith('magnet:')) {
    return { kind: 'magnet-uri', magnet: descriptor.url };
  }

  return { kind: 'hash-synthesized', magnet: buildMagnet(descriptor) };
}

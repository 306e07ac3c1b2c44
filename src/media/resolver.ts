/**
 * Kryten CLI: Media Reference Resolver
 *
 * Turns whatever the user typed after `playlist add` into a provider-tagged
 * reference the bridge can queue. Never throws: unknown input is a Raw id.
 */

export type MediaProvider = 'YouTube' | 'Vimeo' | 'Dailymotion' | 'Raw';

export interface MediaReference {
  provider: MediaProvider;
  id: string;
}

interface UrlPattern {
  provider: MediaProvider;
  pattern: RegExp;
}

// Order matters: first match wins.
const URL_PATTERNS: readonly UrlPattern[] = [
  { provider: 'YouTube', pattern: /youtube\.com\/watch\?(?:[^#]*&)?v=([A-Za-z0-9_-]+)/i },
  { provider: 'YouTube', pattern: /youtu\.be\/([A-Za-z0-9_-]+)/i },
  { provider: 'Vimeo', pattern: /vimeo\.com\/(?:[^?#]*\/)?(\d+)(?:[?#/]|$)/i },
  { provider: 'Dailymotion', pattern: /dailymotion\.com\/video\/([A-Za-z0-9]+)/i },
];

const PREFIX_PROVIDERS: ReadonlyMap<string, MediaProvider> = new Map<string, MediaProvider>([
  ['yt', 'YouTube'],
  ['youtube', 'YouTube'],
  ['vm', 'Vimeo'],
  ['vimeo', 'Vimeo'],
  ['dm', 'Dailymotion'],
  ['dailymotion', 'Dailymotion'],
  ['raw', 'Raw'],
]);

/** YouTube video IDs are always 11 characters from this alphabet. */
const BARE_YOUTUBE_ID = /^[A-Za-z0-9_-]{11}$/;

/**
 * Resolve a URL, `provider:id` token, or bare ID into a MediaReference.
 *
 * @example
 * resolveMedia('https://youtu.be/dQw4w9WgXcQ') // { provider: 'YouTube', id: 'dQw4w9WgXcQ' }
 * resolveMedia('vm:76979871')                  // { provider: 'Vimeo', id: '76979871' }
 * resolveMedia('https://example.com/a.mp4')    // { provider: 'Raw', id: 'https://example.com/a.mp4' }
 */
export function resolveMedia(input: string): MediaReference {
  const trimmed = input.trim();

  for (const { provider, pattern } of URL_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match) {
      return { provider, id: match[1] };
    }
  }

  const prefixed = splitProviderPrefix(trimmed);
  if (prefixed) return prefixed;

  if (BARE_YOUTUBE_ID.test(trimmed)) {
    return { provider: 'YouTube', id: trimmed };
  }

  return { provider: 'Raw', id: trimmed };
}

function splitProviderPrefix(input: string): MediaReference | null {
  const colon = input.indexOf(':');
  if (colon <= 0) return null;

  const provider = PREFIX_PROVIDERS.get(input.slice(0, colon).toLowerCase());
  const id = input.slice(colon + 1);
  if (!provider || id.length === 0) return null;

  return { provider, id };
}

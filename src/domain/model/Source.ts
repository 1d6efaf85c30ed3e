/** Remote resource addressed by URL. Fetched with a plain GET and cached by URL. */
export interface UrlSource {
  readonly kind: 'url';
  readonly url: string;
}

/** Where the raw bytes of a dataset come from. */
export type Source = UrlSource;

export function urlSource(url: string): UrlSource {
  return { kind: 'url', url };
}

/** The string the cache key is derived from. */
export function sourceIdentifier(source: Source): string {
  switch (source.kind) {
    case 'url':
      return source.url;
  }
}

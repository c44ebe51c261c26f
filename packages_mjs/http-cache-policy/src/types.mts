/**
 * Types for the HTTP response cache-policy engine
 */

/**
 * A single header field. Names keep their original case; lookups ignore it.
 */
export interface HttpHeader {
  readonly name: string;
  readonly value: string;
}

/**
 * Ordered multi-map of header fields. A name may repeat.
 */
export type HeaderList = readonly HttpHeader[];

/**
 * Anything that can be turned into a HeaderList
 */
export type HeaderInit =
  | HeaderList
  | Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * Stored response body with its declared length in bytes
 */
export interface CacheBody {
  readonly data: Buffer | string | null;
  readonly length: number;
}

/**
 * Immutable snapshot of a previously received response
 */
export interface CacheEntry {
  /** When the request that produced this response was sent (epoch ms) */
  readonly requestDate: number;
  /** When the response was received (epoch ms) */
  readonly responseDate: number;
  readonly statusCode: number;
  readonly reasonPhrase: string;
  readonly headers: HeaderList;
  readonly body: CacheBody;
}

/**
 * Input accepted by createCacheEntry
 */
export interface CacheEntryInit {
  requestDate: number | Date;
  responseDate: number | Date;
  statusCode: number;
  reasonPhrase?: string;
  headers?: HeaderInit;
  body?: Buffer | string | null;
  /** Declared body length. Defaults to the byte length of body */
  bodyLength?: number;
}

/**
 * Immutable view of an incoming request
 */
export interface CacheRequest {
  readonly method: string;
  readonly uri: string;
  readonly headers: HeaderList;
}

/**
 * Response synthesized from a cache entry
 */
export interface CachedHttpResponse {
  readonly statusCode: number;
  readonly reasonPhrase: string;
  readonly headers: HeaderList;
  /** Always null for 304 Not Modified */
  readonly body: CacheBody | null;
}

/**
 * A parsed Cache-Control token. `value` is undefined for a bare directive.
 */
export interface Directive {
  readonly name: string;
  readonly value?: string;
}

/**
 * Caching policy shared by every evaluation
 */
export interface CacheConfig {
  /** Shared (proxy) cache: honours s-maxage, proxy-revalidate */
  readonly sharedCache: boolean;
  readonly heuristicCachingEnabled: boolean;
  /** Fraction of (Date - Last-Modified) used as heuristic lifetime, in [0, 1] */
  readonly heuristicCoefficient: number;
  /** Heuristic lifetime when Last-Modified is unavailable */
  readonly heuristicDefaultLifetimeSecs: number;
}

/**
 * Why a stored entry could not be used
 */
export type MissReason =
  | 'unsupported-conditional'
  | 'not-fresh-enough'
  | 'content-length-mismatch'
  | 'validators-mismatch'
  | 'request-no-cache'
  | 'request-no-store'
  | 'request-max-age'
  | 'request-max-stale'
  | 'request-min-fresh'
  | 'malformed-directive';

/**
 * Outcome of a suitability check
 */
export type SuitabilityResult =
  | { readonly kind: 'serve-full' }
  | { readonly kind: 'serve-not-modified' }
  | { readonly kind: 'must-fetch'; readonly reason: MissReason };

/**
 * Pluggable key -> entry store
 */
export interface CacheEntryStore {
  get(key: string): Promise<CacheEntry | null>;
  /** Resolves false when the store declined the entry */
  put(key: string, entry: CacheEntry): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  size(): Promise<number>;
  keys(): Promise<string[]>;
  close(): Promise<void>;
}

/**
 * Event types emitted by the engine
 */
export type CachePolicyEventType =
  | 'cache:hit'
  | 'cache:not-modified'
  | 'cache:miss'
  | 'cache:store'
  | 'cache:bypass'
  | 'cache:evict'
  | 'cache:revalidate';

export interface CachePolicyEvent {
  type: CachePolicyEventType;
  key: string;
  uri: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

export type CachePolicyEventListener = (event: CachePolicyEvent) => void;

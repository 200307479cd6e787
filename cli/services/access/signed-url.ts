import { createHash, createHmac, timingSafeEqual } from 'crypto';
import { ConfigurationError } from '../../lib/errors';
import { logger } from '../../utils/logger';

export type SigningAlgorithm = 'md5' | 'sha256';

export interface UrlSignerOptions {
  /** Falls back to GALLERY_SIGNED_URL_SECRET, then SECRET_KEY. */
  secret?: string;
  /** Path prefix the storage key is appended to, e.g. `/media`. */
  baseUrl?: string;
  algorithm?: SigningAlgorithm;
  defaultTtlSeconds?: number;
  /** Milliseconds since the epoch. */
  now?: () => number;
}

export interface SignedUrl {
  url: string;
  expiresAt: number;
  expiresIn: number;
}

const DEFAULT_BASE_URL = '/media';
const DEFAULT_TTL_SECONDS = 3600;

/**
 * Percent-encode a storage key for use in a URL path. Unreserved characters
 * and `/` are kept; everything else is encoded from its UTF-8 bytes.
 */
export function encodeStorageKey(key: string): string {
  return key
    .split('/')
    .map(segment =>
      encodeURIComponent(segment).replace(/[!'()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    )
    .join('/');
}

function base64UrlNoPad(digest: Buffer): string {
  return digest.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/**
 * Time-limited URLs for stored objects.
 *
 * The default `md5` mode produces `md5(path + expires + secret)` exactly as
 * nginx `secure_link_md5 "$uri$arg_e<secret>"` expects, so the edge proxy can
 * check links without calling back. `sha256` keys an HMAC with the secret
 * over the same string and can only be checked here.
 */
export class UrlSigner {
  private readonly secret?: string;
  private readonly baseUrl: string;
  private readonly algorithm: SigningAlgorithm;
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;

  constructor(options: UrlSignerOptions = {}) {
    this.secret = options.secret || process.env.GALLERY_SIGNED_URL_SECRET || process.env.SECRET_KEY || undefined;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.algorithm = options.algorithm ?? 'md5';
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS;
    this.now = options.now ?? Date.now;
  }

  pathFor(storageKey: string): string {
    return `${this.baseUrl}/${encodeStorageKey(storageKey)}`;
  }

  sign(storageKey: string, ttlSeconds: number = this.defaultTtlSeconds): SignedUrl {
    if (!this.secret) {
      throw new ConfigurationError('GALLERY_SIGNED_URL_SECRET or SECRET_KEY must be set for signed URLs');
    }
    const expiresAt = this.nowSeconds() + ttlSeconds;
    const path = this.pathFor(storageKey);
    const signature = this.signature(path, expiresAt, this.secret);
    return {
      url: `${path}?st=${signature}&e=${expiresAt}`,
      expiresAt,
      expiresIn: ttlSeconds,
    };
  }

  /**
   * True only for an unexpired link whose signature matches. Why a link was
   * rejected is logged at debug level and never returned.
   */
  verify(storageKey: string, signature: string, expiresAt: number | string, path?: string): boolean {
    if (!this.secret) {
      logger.debug('Signed URL rejected: no signing secret configured');
      return false;
    }

    const expires = parseExpiry(expiresAt);
    if (expires === null) {
      logger.debug('Signed URL rejected: malformed expiry', { storageKey });
      return false;
    }
    if (this.nowSeconds() > expires) {
      logger.debug('Signed URL rejected: expired', { storageKey, expiresAt: expires });
      return false;
    }

    const expected = Buffer.from(this.signature(path ?? this.pathFor(storageKey), expires, this.secret));
    // Only sha256 signatures may arrive padded; md5 signatures must match exactly.
    const given = Buffer.from(this.algorithm === 'sha256' ? signature.replace(/=+$/, '') : signature);
    if (expected.length !== given.length || !timingSafeEqual(expected, given)) {
      logger.debug('Signed URL rejected: signature mismatch', { storageKey });
      return false;
    }
    return true;
  }

  /**
   * Verify a URL produced by `sign`, taking the key, signature and expiry from
   * the URL itself.
   */
  verifyUrl(url: string): boolean {
    const queryStart = url.indexOf('?');
    if (queryStart < 0) return false;
    const path = url.slice(0, queryStart);
    const params = new URLSearchParams(url.slice(queryStart + 1));
    const signature = params.get('st');
    const expiresAt = params.get('e');
    const prefix = `${this.baseUrl}/`;
    if (!signature || !expiresAt || !path.startsWith(prefix)) return false;

    let storageKey: string;
    try {
      storageKey = decodeURIComponent(path.slice(prefix.length));
    } catch {
      logger.debug('Signed URL rejected: undecodable path', { path });
      return false;
    }
    return this.verify(storageKey, signature, expiresAt, path);
  }

  private signature(path: string, expiresAt: number, secret: string): string {
    const message = `${path}${expiresAt}${secret}`;
    const digest = this.algorithm === 'md5'
      ? createHash('md5').update(message, 'utf8').digest()
      : createHmac('sha256', secret).update(message, 'utf8').digest();
    return base64UrlNoPad(digest);
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}

function parseExpiry(value: number | string): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (!/^-?\d+$/.test(value.trim())) return null;
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : null;
}

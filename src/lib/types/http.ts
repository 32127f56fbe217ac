/**
 * Shared header shapes
 */

/** Ordered multi-valued header map with lower-cased names. */
export type HeaderMap = Readonly<Record<string, readonly string[]>>;

/** Header record as Node and undici hand it out. */
export type IncomingHeaders = Record<string, string | string[] | undefined>;

/** Basic authentication credentials. */
export interface BasicAuthCredentials {
  readonly user: string;
  readonly password: string;
}

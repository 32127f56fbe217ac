/**
 * Cookie storage shared by every call of a client
 *
 * Matches the promise API of tough-cookie's `CookieJar`, so an instance of it
 * can be passed straight to `withCookieJar`. Implementations must tolerate
 * overlapping calls.
 */
export interface CookieJar {
  getCookieString(url: string): Promise<string>;
  setCookie(cookie: string, url: string): Promise<unknown>;
}

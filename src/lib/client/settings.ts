import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_COUNT,
  DEFAULT_RETRY_DELAY_DELTA_MS,
  DEFAULT_RETRY_DELAY_MS,
} from '../constants/defaults.js';
import type { CookieJar } from '../transport/cookie-jar.js';
import { defaultRedirectPolicy, type RedirectPolicy } from '../transport/round-trip.js';
import { UndiciTransport, type Transport } from '../transport/transport.js';
import { noopPostRequestHook, noopPreRequestHook, type PostRequestHook, type PreRequestHook } from './hooks.js';
import { UnlimitedLimiter, type Limiter } from './rate-limiter.js';
import { alwaysRetry, type RetryCondition } from './retry.js';

/**
 * Everything that shapes how a call is executed
 */
export interface ClientSettings {
  rateLimiter: Limiter;
  /** Attempts per call; values below 1 still make one attempt. */
  retryCount: number;
  /** Delay before the second attempt. */
  retryDelayMs: number;
  /** Added to the delay after every wait. */
  retryDelayDeltaMs: number;
  retryCondition: RetryCondition;
  /** Deadline for the whole call including retries; 0 disables it. */
  timeoutMs: number;
  transport: Transport;
  cookieJar: CookieJar | undefined;
  /** Decode gzip, deflate and tar bodies. */
  decompress: boolean;
  checkRedirect: RedirectPolicy;
  preRequestHook: PreRequestHook;
  postRequestHook: PostRequestHook;
}

/** Mutates settings; options are applied in order, later ones win. */
export type Option = (settings: ClientSettings) => void;

export function defaultSettings(): ClientSettings {
  return {
    rateLimiter: new UnlimitedLimiter(),
    retryCount: DEFAULT_RETRY_COUNT,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
    retryDelayDeltaMs: DEFAULT_RETRY_DELAY_DELTA_MS,
    retryCondition: alwaysRetry,
    timeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    transport: new UndiciTransport(),
    cookieJar: undefined,
    decompress: true,
    checkRedirect: defaultRedirectPolicy,
    preRequestHook: noopPreRequestHook,
    postRequestHook: noopPostRequestHook,
  };
}

/** Apply options over a fresh default; the result is frozen. */
export function buildSettings(options: readonly Option[]): Readonly<ClientSettings> {
  const settings = defaultSettings();
  for (const option of options) {
    option(settings);
  }
  return Object.freeze(settings);
}

export function withRateLimiter(limiter: Limiter | undefined): Option {
  return (settings) => {
    if (limiter) settings.rateLimiter = limiter;
  };
}

export function withRetryCount(retries: number): Option {
  return (settings) => {
    settings.retryCount = retries;
  };
}

export function withRetryDelay(delayMs: number): Option {
  return (settings) => {
    settings.retryDelayMs = delayMs;
  };
}

export function withRetryDelayDelta(deltaMs: number): Option {
  return (settings) => {
    settings.retryDelayDeltaMs = deltaMs;
  };
}

export function withRetryCondition(condition: RetryCondition | undefined): Option {
  return (settings) => {
    if (condition) settings.retryCondition = condition;
  };
}

export function withTimeout(timeoutMs: number): Option {
  return (settings) => {
    settings.timeoutMs = timeoutMs;
  };
}

export function withTransport(transport: Transport | undefined): Option {
  return (settings) => {
    if (transport) settings.transport = transport;
  };
}

export function withCookieJar(cookieJar: CookieJar | undefined): Option {
  return (settings) => {
    settings.cookieJar = cookieJar;
  };
}

export function withDecompression(enabled: boolean): Option {
  return (settings) => {
    settings.decompress = enabled;
  };
}

export function withCheckRedirect(policy: RedirectPolicy | undefined): Option {
  return (settings) => {
    if (policy) settings.checkRedirect = policy;
  };
}

export function withPreRequestHook(hook: PreRequestHook | undefined): Option {
  return (settings) => {
    if (hook) settings.preRequestHook = hook;
  };
}

export function withPostRequestHook(hook: PostRequestHook | undefined): Option {
  return (settings) => {
    if (hook) settings.postRequestHook = hook;
  };
}

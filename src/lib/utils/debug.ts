/**
 * Debug logging utilities for retryhttp
 *
 * Output is controlled by the DEBUG environment variable:
 *
 * DEBUG=retryhttp:* - All debug output
 * DEBUG=retryhttp:client - Only execution engine debug
 * DEBUG=retryhttp:http - Only transport / materialization debug
 * DEBUG=retryhttp:ratelimit - Only rate limiter debug
 *
 * In production, debug output is disabled unless DEBUG is set.
 */

import debug from 'debug';

const createDebugger = (namespace: string) => debug(`retryhttp:${namespace}`);

export const debugClient = createDebugger('client');
export const debugHttp = createDebugger('http');
export const debugRateLimit = createDebugger('ratelimit');
export const debugCli = createDebugger('cli');

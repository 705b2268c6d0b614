/**
 * Express rate limiters, built per app so every server instance counts
 * separately.
 *
 * auth    – tight limit for the host-code exchange (4 letters brute-force fast)
 * general – wider limit for all other API routes, except the public state
 *           and version reads that observers poll
 */

import type { Request } from 'express';
import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';

const POLL_ROUTE = /^\/tables\/[^/]+\/(state|version)$/;

/** Public table reads, relative to the `/api` mount. */
export function isPollRequest(req: Pick<Request, 'method' | 'path'>): boolean {
  return req.method === 'GET' && POLL_ROUTE.test(req.path);
}

export interface RateLimiters {
  auth: RateLimitRequestHandler;
  general: RateLimitRequestHandler;
}

export interface RateLimitOptions {
  /** Requests per 15 minutes per IP on the general limiter */
  generalMax?: number;
}

export function createRateLimiters({ generalMax = 600 }: RateLimitOptions = {}): RateLimiters {
  return {
    /** 10 requests per minute per IP */
    auth: rateLimit({
      windowMs: 60 * 1_000,
      max: 10,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'RATE_LIMITED', message: 'Too many requests, please try again later' },
    }),
    general: rateLimit({
      windowMs: 15 * 60 * 1_000,
      max: generalMax,
      skip: isPollRequest,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'RATE_LIMITED', message: 'Too many requests, please try again later' },
    }),
  };
}

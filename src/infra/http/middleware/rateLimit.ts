import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import type { RateLimitConfig } from '../../config.js';

/**
 * API-wide limiter, per client IP. In-memory store: counts reset on restart
 * and are not shared between instances.
 */
export function createApiRateLimiter(config: RateLimitConfig): RateLimitRequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });
}

/**
 * Stricter limiter for the login endpoint.
 */
export function createLoginRateLimiter(config: RateLimitConfig): RateLimitRequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.loginMax,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many login attempts, please try again later.' },
  });
}

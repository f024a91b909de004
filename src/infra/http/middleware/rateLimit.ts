import rateLimit from 'express-rate-limit';

/**
 * General API limiter: 60 requests per minute per client, in-memory.
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    max: 60,
    message: {
      code: 'RATE_LIMITED',
      message: 'Too many requests, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Credential endpoints: 10 requests per minute per IP.
 */
export function createCredentialsRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    max: 10,
    message: {
      code: 'RATE_LIMITED',
      message: 'Too many login attempts, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => req.ip || req.socket.remoteAddress || 'unknown',
  });
}

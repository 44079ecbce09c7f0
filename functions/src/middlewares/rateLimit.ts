import rateLimit from 'express-rate-limit';
import * as functions from 'firebase-functions';

/**
 * General API rate limiter
 * 100 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: 100,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded general rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many requests, please try again later.',
    });
  },
});

/**
 * Limiter for routes that call paid speech and LLM APIs
 * 30 requests per 15 minutes per IP
 */
export const externalApiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: 30,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded speech/assistant rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many voice or assistant requests, please try again later.',
    });
  },
});

/**
 * Rate Limiting Middleware
 * Prevents abuse by limiting request rates.
 */

import rateLimit from "express-rate-limit";

/**
 * General rate limiter for the API and file browser.
 * Limits: 300 requests per 15 minutes per IP.
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 300,
  message: "Too many requests from this IP, please try again later.",
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
});

/**
 * Strict rate limiter for operations that spawn downloads or probe remote sites.
 * Limits: 30 requests per 15 minutes per IP.
 */
export const strictLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 30,
  message: "Too many downloads requested, please slow down.",
  standardHeaders: true,
  legacyHeaders: false,
});

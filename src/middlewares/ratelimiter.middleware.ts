import rateLimit from 'express-rate-limit';

export const rate_limit_api = rateLimit({
  windowMs: 60 * 60 * 1000, // 1 hour
  max: process.env.NODE_ENV !== 'production' ? 10000 : 1000, // max request per hour
  standardHeaders: true,
  legacyHeaders: false,
  message: {detail: 'Too many requests, please try again later'},
});

export const rate_limit_waitlist = rateLimit({
  windowMs: 10 * 60 * 1000, // 10 minutes
  max: process.env.NODE_ENV !== 'production' ? 10000 : 6, // max submissions per window
  standardHeaders: true,
  legacyHeaders: false,
  message: {detail: 'Too many requests, please try again later'},
});

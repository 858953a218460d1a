import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';

const SCRIPT_BLOCK = /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi;
const JAVASCRIPT_URL = /javascript:/gi;
const INLINE_HANDLER = /\bon\w+\s*=/gi;

export function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(SCRIPT_BLOCK, '').replace(JAVASCRIPT_URL, '').replace(INLINE_HANDLER, '');
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value && typeof value === 'object' && !Buffer.isBuffer(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, sanitizeValue(entry)]));
  }
  return value;
}

/**
 * XSS filter: strips script blocks, `javascript:` URLs and inline event
 * handlers from every string in the request body and query. Route params are
 * not matched yet when middleware runs, so they are left to the pipes.
 */
@Injectable()
export class SanitizeInputMiddleware implements NestMiddleware {
  use(req: Request, _res: Response, next: NextFunction) {
    if (req.body && typeof req.body === 'object') {
      req.body = sanitizeValue(req.body);
    }
    for (const [key, value] of Object.entries(req.query)) {
      req.query[key] = sanitizeQueryValue(value);
    }
    next();
  }
}

function sanitizeString(value: string): string {
  const sanitized = sanitizeValue(value);
  return typeof sanitized === 'string' ? sanitized : value;
}

function sanitizeQueryValue(value: Request['query'][string]): Request['query'][string] {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map((entry) => (typeof entry === 'string' ? sanitizeString(entry) : entry));
  }
  return value;
}

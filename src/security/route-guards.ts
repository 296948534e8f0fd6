// Route guards
// Optional API token presence check and fixed-window rate limiting, both
// switched on through env and attached to routes as preHandlers

import crypto from 'node:crypto';
import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { env } from '../env.js';
import { AppError } from '../utils/errors.js';

interface RateBucket {
  count: number;
  resetAt: number;
}

const rateBuckets = new Map<string, RateBucket>();

function getHeaderValue(header: string | string[] | undefined): string {
  if (Array.isArray(header)) {
    return header[0] ?? '';
  }
  return String(header ?? '');
}

function extractBearerToken(authorizationHeader: string): string {
  const parts = authorizationHeader.split(' ');
  if (parts.length !== 2) return '';
  const [scheme, token] = parts;
  if (!/^Bearer$/i.test(scheme)) return '';
  return token.trim();
}

function stableTokenHash(rawToken: string): string {
  return crypto.createHash('sha256').update(rawToken).digest('hex').slice(0, 16);
}

function cleanupExpiredBuckets(now: number) {
  if (rateBuckets.size < 5000) return;
  for (const [key, value] of rateBuckets.entries()) {
    if (value.resetAt <= now) {
      rateBuckets.delete(key);
    }
  }
}

export function extractAuthToken(request: FastifyRequest): string {
  const xApiToken = getHeaderValue(request.headers['x-api-token']).trim();
  if (xApiToken) return xApiToken;

  return extractBearerToken(getHeaderValue(request.headers.authorization));
}

// Private ranges and loopback
const TRUSTED_PROXY_RANGES = [/^10\./, /^172\.(1[6-9]|2[0-9]|3[0-1])\./, /^192\.168\./, /^127\./, /^::1$/];

export function isTrustedProxy(ip: string): boolean {
  return TRUSTED_PROXY_RANGES.some(range => range.test(ip));
}

/**
 * Client address, honouring X-Forwarded-For / X-Real-IP only when the
 * direct peer is a trusted proxy.
 */
export function getRealClientIP(request: FastifyRequest): string {
  const clientIP = request.ip;
  if (!isTrustedProxy(clientIP)) return clientIP;

  const forwarded = request.headers['x-forwarded-for'];
  if (typeof forwarded === 'string' && forwarded) {
    const ips = forwarded.split(',').map(ip => ip.trim());
    // Rightmost untrusted hop is the client
    for (let i = ips.length - 1; i >= 0; i--) {
      if (ips[i] && !isTrustedProxy(ips[i])) {
        return ips[i];
      }
    }
    return ips[0] || clientIP;
  }

  const realIP = request.headers['x-real-ip'];
  if (typeof realIP === 'string' && realIP) {
    return realIP;
  }

  return clientIP;
}

export const requireAuth: preHandlerAsyncHookHandler = async (request: FastifyRequest) => {
  if (!env.AUTH_ENFORCEMENT_ENABLED) return;

  if (!extractAuthToken(request)) {
    throw AppError.unauthorized('Missing API token');
  }
};

interface RateLimitOptions {
  routeKey: string;
  // Read per request so the limit follows env
  maxRequests: () => number;
}

export function rateLimit(options: RateLimitOptions): preHandlerAsyncHookHandler {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!env.RATE_LIMITING_ENABLED) return;

    const now = Date.now();
    cleanupExpiredBuckets(now);

    const token = extractAuthToken(request);
    const clientKey = token ? `token:${stableTokenHash(token)}` : `ip:${getRealClientIP(request)}`;
    const bucketKey = `${options.routeKey}:${clientKey}`;

    const current = rateBuckets.get(bucketKey);
    if (!current || current.resetAt <= now) {
      rateBuckets.set(bucketKey, { count: 1, resetAt: now + env.RATE_LIMIT_WINDOW_MS });
      return;
    }

    if (current.count >= options.maxRequests()) {
      const retryAfterSeconds = Math.max(1, Math.ceil((current.resetAt - now) / 1000));
      reply.header('Retry-After', String(retryAfterSeconds));
      throw AppError.rateLimited(retryAfterSeconds, 'Too many requests. Please try again later.');
    }

    current.count += 1;
  };
}

export function resetRateLimits(): void {
  rateBuckets.clear();
}

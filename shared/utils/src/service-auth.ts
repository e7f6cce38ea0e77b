/**
 * Service-to-Service Authentication
 *
 * Shared-secret token validation via INTERNAL_SERVICE_TOKEN env var.
 * No-op when env var is unset (keeps local dev working).
 */

import { timingSafeEqual } from 'node:crypto';
import { logger } from './logger';

export const SERVICE_TOKEN_HEADER = 'x-internal-service-token';

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function providedToken(req: Request): string | null {
  const header = req.headers.get(SERVICE_TOKEN_HEADER);
  if (header) return header;
  const authorization = req.headers.get('authorization');
  if (authorization?.toLowerCase().startsWith('bearer ')) {
    return authorization.slice('bearer '.length).trim();
  }
  return null;
}

/**
 * Validate the service token from an incoming request
 */
export function validateServiceToken(req: Request): boolean {
  const expectedToken = process.env.INTERNAL_SERVICE_TOKEN;
  if (!expectedToken) {
    return true;
  }

  const token = providedToken(req);
  return token !== null && tokensMatch(token, expectedToken);
}

/**
 * Validates service auth on /api/ routes.
 * Returns a 401 Response if invalid, or null to continue.
 */
export function serviceAuthMiddleware(req: Request): Response | null {
  if (!process.env.INTERNAL_SERVICE_TOKEN) {
    return null;
  }

  const path = new URL(req.url).pathname;
  if (!path.startsWith('/api/')) {
    return null;
  }

  if (!validateServiceToken(req)) {
    logger.warn(`Unauthorized service request to ${path}`);
    return Response.json(
      {
        success: false,
        error: {
          code: 'UNAUTHORIZED',
          message: 'Invalid or missing service token',
          service: 'tfguard',
          timestamp: new Date().toISOString(),
        },
      },
      { status: 401 },
    );
  }

  return null;
}

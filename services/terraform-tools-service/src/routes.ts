/**
 * HTTP surface: health, tool listing, tool invocation and static resources.
 *
 * Every tool call runs under its own AbortController, aborted when the
 * client goes away.
 */

import { Hono } from 'hono';
import type { APIResponse, ServiceError } from '@tfguard/shared-types';
import { ValidationError, logger, serviceAuthMiddleware, toServiceError } from '@tfguard/shared-utils';
import { SERVICE_NAME } from './errors';
import { isResourceName, loadResource } from './resources';
import { healthHandler } from './routes/health';
import type { ToolRegistry } from './tools/registry';

const KIND_STATUS: Record<string, Record<string, number>> = {
  FETCH_ERROR: {
    notFound: 404,
    tooLarge: 413,
    unsupportedFormat: 415,
    timeout: 504,
    networkFailure: 502,
  },
  RUNNER_ERROR: {
    timeout: 504,
    notFound: 502,
    nonZeroExit: 502,
  },
};

const CODE_STATUS: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  EXTRACT_ERROR: 422,
  CANCELLED: 499,
  SCAN_ERROR: 502,
  TIMEOUT_ERROR: 504,
};

function errorKind(details: unknown): string | undefined {
  if (typeof details === 'object' && details !== null && 'kind' in details) {
    const { kind } = details;
    return typeof kind === 'string' ? kind : undefined;
  }
  return undefined;
}

export function statusFor(error: ServiceError): number {
  const kind = errorKind(error.details);
  const byKind = kind === undefined ? undefined : KIND_STATUS[error.code]?.[kind];
  return byKind ?? CODE_STATUS[error.code] ?? 500;
}

function failure(error: ServiceError): Response {
  const body: APIResponse<never> = { success: false, error };
  return Response.json(body, { status: statusFor(error) });
}

function notFound(message: string): Response {
  return failure({ code: 'NOT_FOUND', message, service: SERVICE_NAME, timestamp: new Date().toISOString() });
}

async function readJsonBody(req: Request): Promise<unknown> {
  const text = await req.text();
  if (text.trim() === '') return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON', SERVICE_NAME);
  }
}

export function createApp(registry: ToolRegistry): Hono {
  const app = new Hono();

  app.use('/api/*', async (c, next) => {
    const denied = serviceAuthMiddleware(c.req.raw);
    if (denied) return denied;
    await next();
  });

  app.get('/health', c => c.json(healthHandler()));

  app.get('/api/tools', c => {
    const body: APIResponse<ReturnType<ToolRegistry['describe']>> = { success: true, data: registry.describe() };
    return c.json(body);
  });

  app.post('/api/tools/:name', async c => {
    const name = c.req.param('name');
    const tool = registry.get(name);
    if (!tool) {
      return notFound(`Unknown tool: ${name}`);
    }

    const input = await readJsonBody(c.req.raw);

    const controller = new AbortController();
    const requestSignal = c.req.raw.signal;
    const onAbort = () => controller.abort();
    requestSignal.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await tool.execute(input, { signal: controller.signal });
      if (result.isError) {
        return failure(result.error);
      }
      const body: APIResponse<unknown> = { success: true, data: result.data, output: result.output };
      return c.json(body);
    } finally {
      requestSignal.removeEventListener('abort', onAbort);
    }
  });

  app.get('/api/resources/:name', async c => {
    const name = c.req.param('name');
    if (!isResourceName(name)) {
      return notFound(`Unknown resource: ${name}`);
    }
    const text = await loadResource(name);
    return c.body(text, 200, { 'Content-Type': 'text/markdown; charset=utf-8' });
  });

  app.notFound(c => notFound(`No route for ${c.req.method} ${c.req.path}`));

  app.onError((error, c) => {
    logger.error(`Request handler error on ${c.req.method} ${c.req.path}`, error);
    return failure(toServiceError(error, SERVICE_NAME));
  });

  return app;
}

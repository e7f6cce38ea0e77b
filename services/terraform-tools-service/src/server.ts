import { serve, type ServerType } from '@hono/node-server';
import type { Hono } from 'hono';
import type { ToolkitConfig } from '@tfguard/shared-types';
import { logger } from '@tfguard/shared-utils';
import { createApp } from './routes';
import { TerraformToolkit, type ToolkitDependencies } from './toolkit';
import { createTools } from './tools/definitions';
import { ToolRegistry } from './tools/registry';

export interface Service {
  app: Hono;
  toolkit: TerraformToolkit;
  registry: ToolRegistry;
}

export function createService(config: ToolkitConfig, deps: ToolkitDependencies = {}): Service {
  const toolkit = new TerraformToolkit(config, deps);
  const registry = new ToolRegistry(createTools(toolkit));
  return { app: createApp(registry), toolkit, registry };
}

export function startServer(config: ToolkitConfig, deps: ToolkitDependencies = {}): ServerType {
  const { app, registry } = createService(config, deps);

  const server = serve({ fetch: app.fetch, port: config.port }, info => {
    logger.info(`Terraform Tools Service HTTP server listening on port ${info.port}`, {
      tools: registry.getNames(),
    });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down...`);
    server.close(() => process.exit(0));
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  return server;
}

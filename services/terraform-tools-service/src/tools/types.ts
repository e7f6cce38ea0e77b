/**
 * Tool-call type system
 *
 * Every pipeline entry point is described by a {@link ToolDefinition}: a zod
 * input schema, a permission tier, and an `execute` that never throws. Errors
 * come back inside the {@link ToolResult} in the wire shape used by the HTTP
 * surface.
 */

import type { z } from 'zod';
import type { ServiceError } from '@tfguard/shared-types';
import { ValidationError, logger, toServiceError } from '@tfguard/shared-utils';
import { SERVICE_NAME } from '../errors';

/**
 * | Tier         | Meaning                                        |
 * | ------------ | ---------------------------------------------- |
 * | `auto_allow` | Read-only; safe to run without confirmation     |
 * | `ask_once`   | Writes local files                              |
 * | `always_ask` | Changes real infrastructure                     |
 */
export type PermissionTier = 'auto_allow' | 'ask_once' | 'always_ask';

export type ToolResult<T = unknown> =
  | { isError: false; output: string; data: T }
  | { isError: true; output: string; error: ServiceError };

export interface ToolContext {
  signal?: AbortSignal;
}

export interface ToolDefinition {
  /** snake_case identifier, e.g. `terraform_run_checkov` */
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  permissionTier: PermissionTier;
  /** Modifies files or infrastructure */
  isDestructive: boolean;
  execute(input: unknown, context?: ToolContext): Promise<ToolResult>;
}

export interface ToolSpec<S extends z.ZodTypeAny, T> {
  name: string;
  description: string;
  inputSchema: S;
  permissionTier: PermissionTier;
  isDestructive?: boolean;
  run(input: z.output<S>, context: ToolContext): Promise<{ output: string; data: T }>;
}

export function ok<T>(output: string, data: T): ToolResult<T> {
  return { isError: false, output, data };
}

export function err(error: unknown): ToolResult<never> {
  const serviceError = toServiceError(error, SERVICE_NAME);
  return { isError: true, output: `Error: ${serviceError.message}`, error: serviceError };
}

/**
 * Wrap a typed handler: validate the raw input, run it, and turn anything
 * thrown into an error result.
 */
export function defineTool<S extends z.ZodTypeAny, T>(spec: ToolSpec<S, T>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    permissionTier: spec.permissionTier,
    isDestructive: spec.isDestructive ?? false,

    async execute(raw: unknown, context: ToolContext = {}): Promise<ToolResult> {
      const parsed = spec.inputSchema.safeParse(raw ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`);
        return err(new ValidationError(`Invalid input for ${spec.name}: ${issues.join('; ')}`, SERVICE_NAME, { issues }));
      }

      const started = Date.now();
      try {
        const { output, data } = await spec.run(parsed.data, context);
        logger.info(`Tool ${spec.name} completed`, { durationMs: Date.now() - started });
        return ok(output, data);
      } catch (error) {
        logger.error(`Tool ${spec.name} failed`, error);
        return err(error);
      }
    },
  };
}

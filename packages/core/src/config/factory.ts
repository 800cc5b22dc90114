import * as path from "node:path";
import type { AgentLoopOptions } from "../agent/loop.js";
import { HookPipeline } from "../hooks/pipeline.js";
import { createLogger, type Logger } from "../logger/index.js";
import { createPolicy, type Policy } from "../permission/policy.js";
import type { PermissionCallback } from "../permission/types.js";
import type { Config } from "./schema.js";

export function resolveWorkingDir(config: Config): string {
  return path.resolve(config.workingDir ?? process.cwd());
}

/**
 * Build the frozen policy a config describes. A relative `fileWrite`
 * directory resolves against the working directory.
 *
 * @example
 * ```typescript
 * const policy = policyFromConfig(config, { canUseTool: reviewCall });
 * ```
 */
export function policyFromConfig(config: Config, options: { canUseTool?: PermissionCallback } = {}): Policy {
  const { fileWrite } = config.permissions;
  return createPolicy({
    ...config.permissions,
    fileWrite: typeof fileWrite === "string" ? path.resolve(resolveWorkingDir(config), fileWrite) : fileWrite,
    canUseTool: options.canUseTool,
  });
}

export function loggerFromConfig(config: Config, name = "helmsman"): Logger {
  return createLogger({ name, level: config.logLevel, json: config.logFormat === "json" });
}

/**
 * Everything {@link AgentLoop} takes that a config file can decide. The
 * caller adds the provider and tools.
 *
 * @example
 * ```typescript
 * const agent = new AgentLoop({ ...agentOptionsFromConfig(config), provider, tools });
 * ```
 */
export function agentOptionsFromConfig(
  config: Config,
  options: { logger?: Logger; canUseTool?: PermissionCallback } = {}
): Omit<AgentLoopOptions, "provider"> {
  const logger = options.logger ?? loggerFromConfig(config);
  return {
    name: config.agent.name,
    systemPrompt: config.agent.systemPrompt,
    workingDir: resolveWorkingDir(config),
    policy: policyFromConfig(config, { canUseTool: options.canUseTool }),
    logger,
    hooks: new HookPipeline({ logger, defaultTimeout: config.hooks.timeout }),
    stallWindow: config.agent.stallWindow,
    streamCapacity: config.agent.streamCapacity,
  };
}

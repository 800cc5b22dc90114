/**
 * Delegation to named sub-agents through the `delegate_to_agent` tool.
 *
 * @module @helmsman/core/agent/delegation
 */

import { z } from "zod";
import { errorMessage } from "../errors/index.js";
import type { HookPipeline } from "../hooks/index.js";
import { requestsStop } from "../hooks/index.js";
import type { Logger } from "../logger/index.js";
import { defineTool, fail, ok, type Tool } from "../tool/define.js";
import type { AnyTool } from "../tool/registry.js";
import type { AgentResult } from "./result.js";

export const DELEGATE_TOOL_NAME = "delegate_to_agent";

const SUB_AGENT_SECTION = "# Available Sub-Agents";

/**
 * A specialist the lead agent can hand work to.
 */
export interface AgentDefinition {
  name: string;
  /** Shown to the lead agent to choose between sub-agents */
  description: string;
  systemPrompt?: string;
  tools?: readonly AnyTool[];
}

/**
 * What the delegate tool needs from the agent that owns it.
 */
export interface DelegationHost {
  readonly workingDir: string;
  readonly hooks: HookPipeline;
  readonly logger: Logger;
  /** A fresh agent with the host's policy and working directory */
  spawnSubAgent(definition: AgentDefinition): {
    runSync(task: string, options?: { signal?: AbortSignal }): Promise<AgentResult>;
  };
  requestStop(): void;
}

/**
 * Append a section listing the sub-agents to the lead agent's prompt.
 */
export function buildDelegationPrompt(basePrompt: string | undefined, agents: readonly AgentDefinition[]): string {
  const lines: string[] = [];
  if (basePrompt) {
    lines.push(basePrompt, "");
  }
  if (agents.length > 0) {
    lines.push(
      SUB_AGENT_SECTION,
      "",
      "You can delegate specialized tasks to these sub-agents using the",
      `\`${DELEGATE_TOOL_NAME}\` tool:`,
      ""
    );
    for (const agent of agents) {
      lines.push(`## ${agent.name}`, agent.description, "");
    }
    lines.push(
      "When delegating, provide a clear task description. The sub-agent",
      "will complete the task and return results to you.",
      ""
    );
  }
  return lines.join("\n");
}

const DelegateParameters = z.object({
  agent_name: z.string().describe("Name of the sub-agent to delegate to"),
  task: z.string().describe("The task to delegate to the sub-agent"),
});

export function createDelegateTool(
  agents: readonly AgentDefinition[],
  host: DelegationHost
): Tool<typeof DelegateParameters, string> {
  return defineTool({
    name: DELEGATE_TOOL_NAME,
    description:
      "Delegate a task to a specialized sub-agent. The sub-agent will complete the task and return results.",
    parameters: DelegateParameters,
    annotations: { readOnly: false, destructive: false },
    async execute({ agent_name: agentName, task }, context) {
      const definition = agents.find((agent) => agent.name === agentName);
      if (!definition) {
        const available = agents.map((agent) => agent.name).join(", ");
        return fail(`Unknown agent: ${agentName}. Available agents: ${available}`);
      }

      host.logger.info(`Delegating to ${agentName}: ${task}`);
      let result: AgentResult;
      try {
        result = await host.spawnSubAgent(definition).runSync(task, { signal: context.signal });
      } catch (error) {
        host.logger.error(`Sub-agent '${agentName}' failed: ${errorMessage(error)}`);
        return fail(`Sub-agent '${agentName}' failed.\nError: ${errorMessage(error)}`);
      }

      const hookResult = await host.hooks.fire("SubagentStop", agentName, task, result.finalText, {
        workingDir: host.workingDir,
      });
      if (requestsStop(hookResult)) {
        host.requestStop();
      }
      return ok(result.finalText);
    },
  });
}

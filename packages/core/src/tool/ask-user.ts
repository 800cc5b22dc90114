import { z } from "zod";
import { PERMISSION_PROMPT_TOOL } from "../permission/tool-classes.js";
import { defineTool, fail, ok, type Tool } from "./define.js";

/**
 * Answers a question the model puts to the operator. Injected per agent, so
 * two agents in one process can prompt through different channels.
 */
export type AskUserCallback = (
  question: string,
  choices: readonly string[] | undefined
) => string | Promise<string>;

const AskUserParameters = z.object({
  question: z.string().min(1).describe("Question for the user"),
  choices: z.array(z.string()).optional().describe("Optional answers to pick from"),
});

export function createAskUserTool(askUser: AskUserCallback): Tool<typeof AskUserParameters, string> {
  return defineTool({
    name: PERMISSION_PROMPT_TOOL,
    description: "Ask the user a question and wait for the answer.",
    parameters: AskUserParameters,
    annotations: { readOnly: true, idempotent: false },
    async execute({ question, choices }) {
      const answer = (await askUser(question, choices)).trim();
      return answer.length > 0 ? ok(answer) : fail("The user gave no answer");
    },
  });
}

/**
 * Static name-based classification of well-known tools.
 */

export const CAPABILITY_CLASSES = [
  "fileRead",
  "fileWrite",
  "shell",
  "codeExec",
  "web",
  "packageInstall",
] as const;

export type CapabilityClass = (typeof CAPABILITY_CLASSES)[number];

const TOOL_CLASSES: Readonly<Record<CapabilityClass, readonly string[]>> = {
  fileRead: ["read_file", "list_files"],
  fileWrite: ["write_file", "edit_file"],
  shell: ["run_bash", "bash"],
  codeExec: ["run_code", "run_r_code", "execute_code"],
  web: ["web_search", "web_fetch"],
  packageInstall: ["install_package"],
};

const WRITE_LIKE_CLASSES: ReadonlySet<CapabilityClass> = new Set([
  "fileWrite",
  "shell",
  "codeExec",
  "packageInstall",
]);

/**
 * The tool the model uses to ask the operator a question. Always allowed.
 */
export const PERMISSION_PROMPT_TOOL = "ask_user";

const TOOL_PREFIX = /^tool[_-]/;

/**
 * Lower-case the name and strip an optional `tool_` / `tool-` prefix, so that
 * `Tool_Write_File` and `write_file` are the same tool.
 */
export function normalizeToolName(name: string): string {
  return name.trim().toLowerCase().replace(TOOL_PREFIX, "");
}

export function classifyTool(name: string): CapabilityClass | undefined {
  const normalized = normalizeToolName(name);
  return CAPABILITY_CLASSES.find((capability) => TOOL_CLASSES[capability].includes(normalized));
}

export function isWriteLikeTool(name: string): boolean {
  const capability = classifyTool(name);
  return capability !== undefined && WRITE_LIKE_CLASSES.has(capability);
}

export function matchesToolName(name: string, candidates: readonly string[]): boolean {
  const normalized = normalizeToolName(name);
  return candidates.some((candidate) => normalizeToolName(candidate) === normalized);
}

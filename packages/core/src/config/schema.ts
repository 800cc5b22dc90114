import { z } from "zod";
import { DEFAULT_STREAM_CAPACITY } from "../events/stream.js";
import { DEFAULT_HOOK_TIMEOUT } from "../hooks/types.js";
import { LOG_LEVELS } from "../logger/types.js";
import { PolicySettingsSchema } from "../permission/policy.js";

// ============================================
// Logging Schema
// ============================================

export const LogLevelSchema = z.enum(LOG_LEVELS);

export const LogFormatSchema = z.enum(["text", "json"]);

export type LogFormat = z.infer<typeof LogFormatSchema>;

// ============================================
// Agent Schema
// ============================================

/**
 * Agent behavior settings. Budget ceilings live under `permissions`.
 */
export const AgentSettingsSchema = z
  .object({
    name: z.string().min(1).default("agent"),
    systemPrompt: z.string().optional(),
    /** Identical answers in a row before a stall warning */
    stallWindow: z.number().int().min(2).default(2),
    /** Events buffered before the loop waits for its consumer */
    streamCapacity: z.number().int().positive().default(DEFAULT_STREAM_CAPACITY),
  })
  .strict();

export type AgentSettings = z.infer<typeof AgentSettingsSchema>;

// ============================================
// Hooks Schema
// ============================================

export const HookSettingsSchema = z
  .object({
    /** Milliseconds; 0 runs hooks inline without a time limit */
    timeout: z.number().int().nonnegative().default(DEFAULT_HOOK_TIMEOUT),
  })
  .strict();

// ============================================
// Complete Configuration Schema
// ============================================

export const ConfigSchema = z
  .object({
    logLevel: LogLevelSchema.default("info"),
    logFormat: LogFormatSchema.default("text"),
    /** Defaults to the process working directory */
    workingDir: z.string().min(1).optional(),
    permissions: PolicySettingsSchema.default({}),
    agent: AgentSettingsSchema.default({}),
    hooks: HookSettingsSchema.default({}),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Config as written in files and overrides, before defaults are applied
 */
export type PartialConfig = z.input<typeof ConfigSchema>;

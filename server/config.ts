import fs from "fs";
import path from "path";
import { z } from "zod";
import { KeywordListsSchema, type KeywordLists } from "@shared/schema";

const DEFAULT_KEYWORDS_FILE = path.join(process.cwd(), "server", "data", "intent-keywords.json");

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  LLM_PROVIDER: z.enum(["openai", "mistral"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  MISTRAL_API_KEY: z.string().optional(),
  CHAT_MODEL: z.string().optional(),
  ROUTER_MODEL: z.string().optional(),
  ROUTER_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  ROUTER_LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  ROUTER_LLM_ENABLED: booleanFlag,
  ROUTER_KEYWORDS_FILE: z.string().optional(),
  ROUTER_SCHEDULING_KEYWORDS: z.string().optional(),
  ROUTER_QNA_KEYWORDS: z.string().optional(),
  MAX_APPOINTMENT_DAYS_AHEAD: z.coerce.number().int().positive().default(90),
});

export type LLMProviderName = "openai" | "mistral";

export interface RouterConfig {
  confidenceThreshold: number;
  llmEnabled: boolean;
  llmTimeoutMs: number;
  keywords: KeywordLists;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  llm: {
    provider: LLMProviderName;
    openaiApiKey?: string;
    mistralApiKey?: string;
    chatModel?: string;
    routerModel?: string;
  };
  router: RouterConfig;
  appointments: {
    maxDaysAhead: number;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function readKeywordFile(filePath: string): KeywordLists {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read keyword file ${filePath}: ${reason}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Keyword file ${filePath} is not valid JSON`);
  }

  const parsed = KeywordListsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Keyword file ${filePath} must contain "scheduling" and "qna" string arrays`);
  }
  return parsed.data;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = value === "" ? undefined : value;
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(emptyToUndefined(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration - ${details}`);
  }
  const vars = parsed.data;

  const fileKeywords = readKeywordFile(
    vars.ROUTER_KEYWORDS_FILE ? path.resolve(vars.ROUTER_KEYWORDS_FILE) : DEFAULT_KEYWORDS_FILE
  );
  const keywords: KeywordLists = {
    scheduling: vars.ROUTER_SCHEDULING_KEYWORDS
      ? splitList(vars.ROUTER_SCHEDULING_KEYWORDS)
      : fileKeywords.scheduling,
    qna: vars.ROUTER_QNA_KEYWORDS ? splitList(vars.ROUTER_QNA_KEYWORDS) : fileKeywords.qna,
  };

  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    llm: {
      provider: vars.LLM_PROVIDER,
      openaiApiKey: vars.OPENAI_API_KEY,
      mistralApiKey: vars.MISTRAL_API_KEY,
      chatModel: vars.CHAT_MODEL,
      routerModel: vars.ROUTER_MODEL,
    },
    router: {
      confidenceThreshold: vars.ROUTER_CONFIDENCE_THRESHOLD,
      llmEnabled: vars.ROUTER_LLM_ENABLED,
      llmTimeoutMs: vars.ROUTER_LLM_TIMEOUT_MS,
      keywords,
    },
    appointments: {
      maxDaysAhead: vars.MAX_APPOINTMENT_DAYS_AHEAD,
    },
  };
}

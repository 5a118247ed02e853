import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./utils/error-handling";

export interface AppConfig {
  tempoApiToken: string;
  jiraEmail: string;
  jiraApiToken: string;
  /** Hostname only, e.g. `example.atlassian.net` */
  jiraSite: string;
  caBundlePath: string | null;
  daysBack: number | null;
  outputDir: string;
  requestTimeoutMs: number;
  tempoPageSize: number;
  tempoPageDelayMs: number;
  userCacheSize: number;
}

const emptyToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const required = z.string({ required_error: "is required" }).trim().min(1, "is required");

const intWithDefault = (fallback: number, min: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).default(fallback));

const envSchema = z.object({
  TEMPO_API_TOKEN: required,
  JIRA_EMAIL: required,
  JIRA_API_TOKEN: required,
  JIRA_SITE: required.transform((site) => site.replace(/^https?:\/\//i, "").replace(/\/+$/, "")),
  CA_BUNDLE: z.preprocess(emptyToUndefined, z.string().optional()),
  UTILISATION_DAYS_BACK: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),
  OUTPUT_DIR: z.preprocess(emptyToUndefined, z.string().default(".")),
  REQUEST_TIMEOUT_MS: intWithDefault(30_000, 1),
  TEMPO_PAGE_SIZE: intWithDefault(100, 1),
  TEMPO_PAGE_DELAY_MS: intWithDefault(200, 0),
  USER_CACHE_SIZE: intWithDefault(500, 1),
});

/**
 * Validate the process environment into an immutable config object.
 * Every problem is reported in one `ConfigError` so the user can fix them together.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  const values = parsed.data;
  return Object.freeze({
    tempoApiToken: values.TEMPO_API_TOKEN,
    jiraEmail: values.JIRA_EMAIL,
    jiraApiToken: values.JIRA_API_TOKEN,
    jiraSite: values.JIRA_SITE,
    caBundlePath: values.CA_BUNDLE ?? null,
    daysBack: values.UTILISATION_DAYS_BACK ?? null,
    outputDir: values.OUTPUT_DIR,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    tempoPageSize: values.TEMPO_PAGE_SIZE,
    tempoPageDelayMs: values.TEMPO_PAGE_DELAY_MS,
    userCacheSize: values.USER_CACHE_SIZE,
  });
}

export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}

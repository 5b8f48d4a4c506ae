import dotenv from "dotenv";
import os from "os";
import path from "path";
import { z } from "zod";

dotenv.config({ path: path.resolve(process.cwd(), ".env") });

// z.coerce.boolean() treats "false" as true
const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z
  .object({
    GMAIL_CLIENT_ID: z.string().min(1),
    GMAIL_CLIENT_SECRET: z.string().min(1),
    GMAIL_REFRESH_TOKEN: z.string().min(1),
    GMAIL_REDIRECT_URI: z
      .string()
      .url()
      .default("http://localhost:3000/oauth2callback"),
    GMAIL_QUERY_DAYS: z.coerce.number().int().positive().default(7),
    GMAIL_MAX_RESULTS: z.coerce.number().int().min(1).max(500).default(100),
    DELETE_AFTER_SYNC: booleanFlag.default("true"),
    SINK: z.enum(["sheets", "notion"]).default("sheets"),
    SPREADSHEET_ID: z.string().optional(),
    SHEET_NAME: z.string().min(1).default("Applications"),
    NOTION_TOKEN: z.string().optional(),
    NOTION_DATABASE_ID: z.string().optional(),
    CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
    OPENROUTER_API_KEY: z.string().optional(),
    OPENROUTER_MODEL: z.string().min(1).default("google/gemini-2.0-flash-001"),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    DB_PATH: z.string().min(1).default("data/processed.sqlite"),
    LOCK_FILE: z
      .string()
      .min(1)
      .default(path.join(os.tmpdir(), "job_tracker.lock")),
    LOCK_TIMEOUT_MS: z.coerce.number().int().min(0).default(10000),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    LOG_FILE: z.string().default("logs/app.log"),
    CRON_SCHEDULE: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.SINK === "sheets" && !env.SPREADSHEET_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SPREADSHEET_ID"],
        message: "Required when SINK=sheets",
      });
    }
    if (env.SINK === "notion") {
      for (const key of ["NOTION_TOKEN", "NOTION_DATABASE_ID"] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: "Required when SINK=notion",
          });
        }
      }
    }
  });

type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  gmail: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    refreshToken: string;
    queryDays: number;
    maxResults: number;
    deleteAfterSync: boolean;
  };
  sink:
    | { kind: "sheets"; spreadsheetId: string; sheetName: string }
    | { kind: "notion"; token: string; databaseId: string };
  llm: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };
  confidenceThreshold: number;
  dbPath: string;
  lock: {
    file: string;
    timeoutMs: number;
  };
  log: {
    level: Env["LOG_LEVEL"];
    file?: string;
  };
  cron: {
    schedule?: string;
  };
}

const blankToUndefined = (value: string | undefined): string | undefined =>
  value && value.trim() ? value : undefined;

function buildSink(env: Env): AppConfig["sink"] {
  if (env.SINK === "notion") {
    return {
      kind: "notion",
      token: env.NOTION_TOKEN ?? "",
      databaseId: env.NOTION_DATABASE_ID ?? "",
    };
  }
  return {
    kind: "sheets",
    spreadsheetId: env.SPREADSHEET_ID ?? "",
    sheetName: env.SHEET_NAME,
  };
}

export function loadConfig(
  source: NodeJS.ProcessEnv = process.env
): AppConfig {
  // `KEY=` lines in .env count as unset, except LOG_FILE= which turns file output off
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(
      ([key, value]) => value !== "" || key === "LOG_FILE"
    )
  );
  const parsed = envSchema.safeParse(cleaned);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  const env = parsed.data;
  return {
    gmail: {
      clientId: env.GMAIL_CLIENT_ID,
      clientSecret: env.GMAIL_CLIENT_SECRET,
      redirectUri: env.GMAIL_REDIRECT_URI,
      refreshToken: env.GMAIL_REFRESH_TOKEN,
      queryDays: env.GMAIL_QUERY_DAYS,
      maxResults: env.GMAIL_MAX_RESULTS,
      deleteAfterSync: env.DELETE_AFTER_SYNC,
    },
    sink: buildSink(env),
    llm: {
      apiKey: blankToUndefined(env.OPENROUTER_API_KEY),
      model: env.OPENROUTER_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
    },
    confidenceThreshold: env.CONFIDENCE_THRESHOLD,
    dbPath: env.DB_PATH,
    lock: {
      file: env.LOCK_FILE,
      timeoutMs: env.LOCK_TIMEOUT_MS,
    },
    log: {
      level: env.LOG_LEVEL,
      file: blankToUndefined(env.LOG_FILE),
    },
    cron: {
      schedule: blankToUndefined(env.CRON_SCHEDULE),
    },
  };
}

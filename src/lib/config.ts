import fs from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { CONFIG_PATH } from "./constants";
import { ConfigError, toError } from "./errors";
import type { DigestConfig, DigestEnv } from "./types";

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const configSchema = z.object({
  timezone: z.string().refine(isTimeZone, "is not a valid IANA time zone").default("UTC"),
  digest: z
    .object({
      reading_wpm: z.number().int().min(80).max(1000).default(225),
      max_highlights: z.number().int().min(1).nullable().default(null)
    })
    .default({}),
  publish: z
    .object({
      posts_dir: z.string().min(1).default("content/posts"),
      filename_suffix: z
        .string()
        .regex(/^[a-z0-9-]+$/, "must contain lowercase letters, digits and dashes only")
        .default("weekly-reading-digest")
    })
    .default({})
});

// CI exports unset secrets as empty strings.
const optionalVar = z.preprocess((value) => (value === "" ? undefined : value), z.string().optional());

const envSchema = z.object({
  READWISE_ACCESS_TOKEN: z.string().min(1, "is required"),
  GITHUB_TOKEN: optionalVar,
  GITHUB_REPO_OWNER: optionalVar,
  GITHUB_REPO_NAME: optionalVar,
  GITHUB_TARGET_BRANCH: z.preprocess((value) => (value === "" ? undefined : value), z.string().default("main"))
});

const GITHUB_VARS = ["GITHUB_TOKEN", "GITHUB_REPO_OWNER", "GITHUB_REPO_NAME"] as const;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `- ${path}: ${issue.message}`;
    })
    .join("\n");
}

export function parseConfig(raw: string): DigestConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw) ?? {};
  } catch (error) {
    throw new ConfigError(`config.yml is not valid YAML: ${toError(error).message}`, { cause: error });
  }
  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Configuration is invalid:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Reads `config.yml`; every setting has a default, so the file is optional. */
export async function loadConfig(configPath: string = CONFIG_PATH): Promise<DigestConfig> {
  try {
    const raw = await fs.readFile(configPath, "utf8");
    return parseConfig(raw);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return parseConfig("");
    }
    throw error;
  }
}

export function loadEnv(env: NodeJS.ProcessEnv, options: { requireGitHub: boolean }): DigestEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Environment is invalid:\n${formatIssues(result.error)}`);
  }
  const vars = result.data;

  const { GITHUB_TOKEN: token, GITHUB_REPO_OWNER: owner, GITHUB_REPO_NAME: repo } = vars;
  if (token && owner && repo) {
    return {
      readwiseToken: vars.READWISE_ACCESS_TOKEN,
      github: { token, owner, repo, branch: vars.GITHUB_TARGET_BRANCH }
    };
  }

  if (options.requireGitHub) {
    const missing = GITHUB_VARS.filter((name) => !vars[name]);
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }
  return { readwiseToken: vars.READWISE_ACCESS_TOKEN, github: null };
}

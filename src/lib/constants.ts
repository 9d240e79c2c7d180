import path from "node:path";

export const ROOT_DIR = process.cwd();
export const CONTENT_DIR = path.resolve(ROOT_DIR, "content");
export const DRY_RUN_DIR = path.resolve(CONTENT_DIR, "digests");
export const CONFIG_PATH = path.resolve(ROOT_DIR, "config.yml");

export const READER_BASE_URL = "https://readwise.io/api/v3/";
export const MAIN_BASE_URL = "https://readwise.io/api/v2/";
export const GITHUB_API_URL = "https://api.github.com";

export const LOOKBACK_DAYS = 7;
export const DAY_MS = 24 * 60 * 60 * 1000;
export const HOUR_MS = 60 * 60 * 1000;

export const MAX_ATTEMPTS = 3;
export const BASE_DELAY_MS = 1000;
export const HIGHLIGHT_PAGE_SIZE = 1000;

export const UNKNOWN_LABEL = "unknown";

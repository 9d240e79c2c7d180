export const COLORS = {
  reset: "\x1b[0m",
  info: "\x1b[36m",
  success: "\x1b[32m",
  warn: "\x1b[33m",
  detail: "\x1b[90m"
} as const;

export const GLYPHS = {
  page: "→",
  success: "✓",
  warn: "⚠",
  info: "ℹ",
  folder: "▸",
  stats: "≡",
  timer: "⏱"
} as const;

export interface Logger {
  info(message: string): void;
  detail(message: string): void;
  success(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  info(message) {
    console.log(`${COLORS.info}${GLYPHS.info}${COLORS.reset} ${message}`);
  },
  detail(message) {
    console.log(`${COLORS.detail}${GLYPHS.page}${COLORS.reset} ${message}`);
  },
  success(message) {
    console.log(`${COLORS.success}${GLYPHS.success}${COLORS.reset} ${message}`);
  },
  warn(message) {
    console.warn(`${COLORS.warn}${GLYPHS.warn}${COLORS.reset} ${message}`);
  }
};

export const silentLogger: Logger = {
  info() {},
  detail() {},
  success() {},
  warn() {}
};

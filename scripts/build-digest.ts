#!/usr/bin/env tsx
import path from "node:path";
import process from "node:process";
import ora, { type Ora } from "ora";
import { ReaderDocumentSource } from "../src/document-source";
import { FilePublisher } from "../src/file-publisher";
import { GitHubPublisher } from "../src/github-publisher";
import { ReadwiseHighlightSource } from "../src/highlight-source";
import { checkReadwiseToken } from "../src/readwise-auth";
import { runDigest, type DigestPhase, type PhaseEvent } from "../src/run-digest";
import { loadConfig, loadEnv } from "../src/lib/config";
import { DRY_RUN_DIR } from "../src/lib/constants";
import { createTokenTransport, ResilientFetcher } from "../src/lib/fetcher";
import { COLORS, GLYPHS, consoleLogger } from "../src/lib/log";
import type { Publisher } from "../src/lib/types";

const PHASE_LABELS: Record<DigestPhase, string> = {
  documents: "Fetching archived documents from Reader",
  highlights: "Fetching highlights",
  render: "Building digest",
  publish: "Publishing digest"
};

interface CliFlags {
  dryRun: boolean;
  check: boolean;
}

function parseFlags(argv: string[]): CliFlags {
  const known = new Set(["--dry-run", "--check"]);
  const unknown = argv.filter((arg) => !known.has(arg));
  if (unknown.length > 0) {
    throw new Error(`Unknown argument(s): ${unknown.join(" ")}. Usage: build-digest [--dry-run] [--check]`);
  }
  return { dryRun: argv.includes("--dry-run"), check: argv.includes("--check") };
}

async function main() {
  const startTime = Date.now();
  let spinner: Ora | null = null;

  try {
    const flags = parseFlags(process.argv.slice(2));

    spinner = ora("Loading configuration...").start();
    const config = await loadConfig();
    const env = loadEnv(process.env, { requireGitHub: !flags.dryRun });
    spinner.succeed(`Configuration loaded (timezone: ${config.timezone}, ${flags.dryRun ? "dry run" : "publishing to GitHub"})`);

    const readwiseTransport = createTokenTransport(env.readwiseToken);

    if (flags.check) {
      spinner = ora("Checking Readwise token...").start();
      const ok = await checkReadwiseToken(readwiseTransport, { logger: consoleLogger });
      if (!ok) {
        spinner.fail("Readwise token was rejected");
        process.exit(1);
      }
      spinner.succeed("Readwise token accepted");
      process.exit(0);
    }

    const fetcher = new ResilientFetcher({ transport: readwiseTransport, logger: consoleLogger });
    const publisher: Publisher =
      flags.dryRun || env.github === null
        ? new FilePublisher(DRY_RUN_DIR)
        : new GitHubPublisher({ ...env.github, logger: consoleLogger });

    const onProgress = (event: PhaseEvent) => {
      const label = PHASE_LABELS[event.phase];
      if (event.status === "start") {
        spinner = ora(event.detail ? `${label} (${event.detail})...` : `${label}...`).start();
        return;
      }
      spinner?.succeed(event.detail ? `${label}: ${event.detail}` : label);
    };

    const result = await runDigest({
      documents: new ReaderDocumentSource(fetcher, { logger: consoleLogger }),
      highlights: new ReadwiseHighlightSource(fetcher, { logger: consoleLogger }),
      publisher,
      config,
      logger: consoleLogger,
      onProgress
    });

    const elapsed = Math.round((Date.now() - startTime) / 1000);
    const { documents, highlights } = result.report;
    console.log(`\n${COLORS.success}${GLYPHS.success} Weekly digest ${flags.dryRun ? "written" : "committed"} successfully!${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.folder} ${flags.dryRun ? path.relative(process.cwd(), path.join(DRY_RUN_DIR, result.filePath)) : result.commit.url}${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.stats} ${documents.totalCount} articles, ${documents.totalWordCount.toLocaleString("en-US")} words, ${highlights.totalCount} highlights${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.timer} Generated in ${elapsed}s${COLORS.reset}\n`);

    process.exit(0);
  } catch (error) {
    if (spinner) {
      spinner.fail("Digest build failed");
    }
    console.error(`\n${COLORS.warn}Error:${COLORS.reset}`, error);
    process.exit(1);
  }
}

void main();

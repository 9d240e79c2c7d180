#!/usr/bin/env tsx

/**
 * Validation script for config.yml and the environment the digest needs.
 *
 * Usage:
 *   npx tsx scripts/validate-config.ts [--dry-run]
 *
 * Validates:
 * - config.yml structure, types and ranges (the file itself is optional)
 * - READWISE_ACCESS_TOKEN, and the GitHub variables unless --dry-run is passed
 *
 * Makes no network calls.
 */

import { existsSync } from "node:fs";
import process from "node:process";
import { loadConfig, loadEnv } from "../src/lib/config";
import { CONFIG_PATH } from "../src/lib/constants";
import { ConfigError } from "../src/lib/errors";

interface ValidationError {
  source: string;
  message: string;
}

const errors: ValidationError[] = [];

async function validateConfigFile(): Promise<void> {
  if (!existsSync(CONFIG_PATH)) {
    console.log(`ℹ️  ${CONFIG_PATH} not found, defaults will be used`);
  }
  try {
    const config = await loadConfig(CONFIG_PATH);
    console.log(`   timezone: ${config.timezone}`);
    console.log(`   reading speed: ${config.digest.reading_wpm} wpm`);
    console.log(`   posts directory: ${config.publish.posts_dir}`);
  } catch (error) {
    if (error instanceof ConfigError) {
      errors.push({ source: CONFIG_PATH, message: error.message });
      return;
    }
    throw error;
  }
}

function validateEnvironment(requireGitHub: boolean): void {
  try {
    const env = loadEnv(process.env, { requireGitHub });
    if (env.github) {
      console.log(`   publishing to ${env.github.owner}/${env.github.repo}@${env.github.branch}`);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      errors.push({ source: "environment", message: error.message });
      return;
    }
    throw error;
  }
}

async function main(): Promise<void> {
  console.log("🔍 Validating configuration...\n");

  await validateConfigFile();
  validateEnvironment(!process.argv.includes("--dry-run"));

  if (errors.length === 0) {
    console.log("\n✅ Configuration is valid!\n");
    process.exit(0);
  } else {
    console.error("\n❌ Validation errors found:\n");
    errors.forEach((error) => {
      console.error(`  ${error.source}`);
      console.error(`    ${error.message.split("\n").join("\n    ")}\n`);
    });
    process.exit(1);
  }
}

void main();

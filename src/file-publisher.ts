import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { DRY_RUN_DIR } from "@/lib/constants";
import type { CommitInfo, Publisher } from "@/lib/types";

/** Writes the post under a local directory instead of committing it. Used by `--dry-run`. */
export class FilePublisher implements Publisher {
  constructor(private readonly rootDir: string = DRY_RUN_DIR) {}

  async publish(filePath: string, content: string, commitMessage: string): Promise<CommitInfo> {
    const target = path.join(this.rootDir, filePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf8");
    return {
      sha: crypto.createHash("sha1").update(content).digest("hex"),
      url: pathToFileURL(target).toString(),
      message: commitMessage,
      filePath
    };
  }
}

import { z } from "zod";
import { GITHUB_API_URL } from "@/lib/constants";
import { PublishError, toError } from "@/lib/errors";
import { createTokenTransport, defaultTransport, type Transport } from "@/lib/fetcher";
import { silentLogger, type Logger } from "@/lib/log";
import type { CommitInfo, Publisher } from "@/lib/types";

export interface GitHubPublisherOptions {
  token: string;
  owner: string;
  repo: string;
  branch?: string;
  apiUrl?: string;
  transport?: Transport;
  logger?: Logger;
}

const existingFileSchema = z.object({ sha: z.string() }).passthrough();

const commitResponseSchema = z
  .object({
    commit: z.object({ sha: z.string(), html_url: z.string() }).passthrough()
  })
  .passthrough();

export function encodeRepoPath(filePath: string): string {
  return filePath
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join("/");
}

/**
 * Creates or updates one file through the GitHub contents API. Does not retry: a failed
 * publish is reported to the caller as is.
 */
export class GitHubPublisher implements Publisher {
  private readonly transport: Transport;
  private readonly apiUrl: string;
  private readonly branch: string;
  private readonly logger: Logger;

  constructor(private readonly options: GitHubPublisherOptions) {
    this.transport = createTokenTransport(options.token, "Bearer", options.transport ?? defaultTransport);
    this.apiUrl = options.apiUrl ?? GITHUB_API_URL;
    this.branch = options.branch ?? "main";
    this.logger = options.logger ?? silentLogger;
  }

  async publish(filePath: string, content: string, commitMessage: string): Promise<CommitInfo> {
    const url = `${this.apiUrl}/repos/${this.options.owner}/${this.options.repo}/contents/${encodeRepoPath(filePath)}`;
    const existingSha = await this.findExistingSha(url, filePath);

    if (existingSha) {
      this.logger.detail(`File ${filePath} already exists, will update`);
    } else {
      this.logger.detail(`File ${filePath} does not exist, will create`);
    }

    const body = {
      message: commitMessage,
      content: Buffer.from(content, "utf8").toString("base64"),
      branch: this.branch,
      ...(existingSha ? { sha: existingSha } : {})
    };
    const response = await this.send(url, { method: "PUT", body: JSON.stringify(body) }, filePath);

    if (response.status === 409 || response.status === 422) {
      throw new PublishError(`GitHub rejected ${filePath} as conflicting (${response.status}): ${await readText(response)}`, "conflict");
    }
    if (!response.ok) {
      throw new PublishError(`GitHub PUT ${filePath} returned ${response.status}: ${await readText(response)}`, "rejected");
    }

    const parsed = commitResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new PublishError(`GitHub PUT ${filePath} returned an unexpected body`, "rejected");
    }

    this.logger.success(`${existingSha ? "Updated" : "Created"} ${filePath}`);
    return {
      sha: parsed.data.commit.sha,
      url: parsed.data.commit.html_url,
      message: commitMessage,
      filePath
    };
  }

  private async findExistingSha(url: string, filePath: string): Promise<string | null> {
    const target = new URL(url);
    target.searchParams.set("ref", this.branch);
    const response = await this.send(target.toString(), { method: "GET" }, filePath);

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new PublishError(`Error checking whether ${filePath} exists (${response.status}): ${await readText(response)}`, "unavailable");
    }
    const parsed = existingFileSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new PublishError(`${filePath} exists but is not a file`, "conflict");
    }
    return parsed.data.sha;
  }

  private async send(url: string, init: RequestInit, filePath: string): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set("Accept", "application/vnd.github+json");
    try {
      return await this.transport(url, { ...init, headers });
    } catch (error) {
      throw new PublishError(`GitHub request for ${filePath} failed: ${toError(error).message}`, "unavailable", { cause: error });
    }
  }
}

async function readText(response: Response): Promise<string> {
  const text = await response.text().catch(() => "(no body)");
  return text.slice(0, 200);
}

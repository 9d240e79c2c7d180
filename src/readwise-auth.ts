import { MAIN_BASE_URL } from "@/lib/constants";
import { toError } from "@/lib/errors";
import type { Transport } from "@/lib/fetcher";
import { silentLogger, type Logger } from "@/lib/log";

/** `GET auth/` answers 204 for a valid token. Never throws. */
export async function checkReadwiseToken(
  transport: Transport,
  options: { baseUrl?: string; logger?: Logger } = {}
): Promise<boolean> {
  const logger = options.logger ?? silentLogger;
  const url = new URL("auth/", options.baseUrl ?? MAIN_BASE_URL).toString();
  try {
    const response = await transport(url, { method: "GET" });
    if (response.status === 204) {
      return true;
    }
    logger.warn(`Readwise token check returned ${response.status}`);
    return false;
  } catch (error) {
    logger.warn(`Readwise token check failed: ${toError(error).message}`);
    return false;
  }
}

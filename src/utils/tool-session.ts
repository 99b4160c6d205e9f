import type { SirilClient } from "../types/siril";
import type { Logger } from "./logger";

/**
 * Run an operation inside one Siril session
 *
 * The session is closed on every exit path. When both the operation and the
 * close fail, the operation's error propagates and the close failure is logged.
 */
export async function withSession<T>(
  client: SirilClient,
  operation: () => Promise<T>,
  logger?: Logger,
): Promise<T> {
  await client.openSession();

  let result: T;
  try {
    result = await operation();
  } catch (error) {
    try {
      await client.closeSession();
    } catch (closeError) {
      logger?.error("Failed to close Siril session", toError(closeError));
    }
    throw error;
  }

  await client.closeSession();
  return result;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

import { BrowserLaunchError, errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { BrowserLauncher, BrowserPage, BrowserSession } from "./browser";

/**
 * Runs `task` against a freshly launched page; the browser is closed on every exit path.
 * A launch failure surfaces as `BrowserLaunchError`.
 */
export async function withBrowserSession<T>(
  launcher: BrowserLauncher,
  logger: Logger,
  task: (page: BrowserPage) => Promise<T>,
): Promise<T> {
  let session: BrowserSession;
  try {
    session = await launcher.launch();
  } catch (error) {
    logger.error("session_launch_failed", { error: errorMessage(error) });
    throw new BrowserLaunchError(`Browser failed to launch: ${errorMessage(error)}`, { cause: error });
  }
  logger.debug("session_opened");
  try {
    return await task(session.page);
  } finally {
    try {
      await session.close();
      logger.debug("session_closed");
    } catch (error) {
      logger.warn("session_close_failed", { error: errorMessage(error) });
    }
  }
}

/*
 * `wirebridge serve`: run the connection editor on localhost until SIGINT/SIGTERM.
 * Browser auto-open is best-effort and skipped outside an interactive terminal.
 */

import { execa } from "execa";

import { logEvent } from "../core/logger.js";
import { SessionStore } from "../session/session-store.js";
import { createEditorApp } from "../ui/router.js";
import { startEditorServer, type EditorServerHandle } from "../ui/server.js";

import { createCliRuntime } from "./runtime.js";

// =============================================================================
// TYPES
// =============================================================================

// process in production; any emitter in tests.
export type StopSignalSource = {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
};

export type ServeCommandOptions = {
  config?: string;
  host?: string;
  port?: number;
  storageDir?: string;
  open?: boolean;
};

// =============================================================================
// SERVE COMMAND
// =============================================================================

export async function serveCommand(opts: ServeCommandOptions): Promise<void> {
  const runtime = createCliRuntime({
    configPath: opts.config,
    service: "http",
    overrides: {
      host: opts.host,
      port: opts.port,
      storage_dir: opts.storageDir,
      open_browser: opts.open,
    },
  });
  const { config, paths, log } = runtime;

  const sessions = new SessionStore({ maxSessions: config.max_sessions });
  const app = createEditorApp({ config, paths, log, sessions });
  const handle = await startEditorServer({ app, host: config.host, port: config.port });

  logEvent(log, "server.start", { url: handle.url, storage: paths.root });
  console.log(`Connection editor running at ${handle.url}`);
  console.log(`Storage: ${paths.root}`);
  await maybeOpenBrowser(handle.url, config.open_browser);

  const signal = await waitForStopSignal();
  console.log(`Received ${signal}. Shutting down editor server.`);
  await closeEditorServer(handle);
  logEvent(log, "server.stop", { signal, sessions: sessions.size });
}

// =============================================================================
// BROWSER OPEN
// =============================================================================

export async function maybeOpenBrowser(url: string, openBrowser: boolean): Promise<void> {
  if (!shouldOpenBrowser(openBrowser)) {
    return;
  }

  try {
    await openBrowserUrl(url);
  } catch (err) {
    const detail = err instanceof Error ? ` ${err.message}` : "";
    console.warn(`Warning: could not open a browser.${detail} Open ${url} manually.`);
  }
}

function shouldOpenBrowser(openBrowser: boolean): boolean {
  if (!openBrowser) return false;
  if (!process.stdout.isTTY) return false;
  if (process.env.CI) return false;
  return true;
}

async function openBrowserUrl(url: string): Promise<void> {
  if (process.platform === "darwin") {
    await execa("open", [url], { stdio: "ignore" });
    return;
  }

  if (process.platform === "win32") {
    await execa("cmd", ["/c", "start", "", url], {
      stdio: "ignore",
      windowsHide: true,
    });
    return;
  }

  await execa("xdg-open", [url], { stdio: "ignore" });
}

// =============================================================================
// SHUTDOWN
// =============================================================================

const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// Resolves with the first stop signal received, detaching the listener for the other.
export function waitForStopSignal(source: StopSignalSource = process): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const listeners: Array<readonly [NodeJS.Signals, () => void]> = STOP_SIGNALS.map((signal) => {
      const listener = (): void => {
        for (const [other, handler] of listeners) {
          source.off(other, handler);
        }
        resolve(signal);
      };
      source.once(signal, listener);
      return [signal, listener] as const;
    });
  });
}

async function closeEditorServer(handle: EditorServerHandle): Promise<void> {
  try {
    await handle.close();
  } catch (err) {
    const detail = err instanceof Error && err.message ? ` ${err.message}` : "";
    console.warn(`Warning: failed to close editor server.${detail}`);
  }
}

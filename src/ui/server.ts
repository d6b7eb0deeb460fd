import http, { type RequestListener } from "node:http";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type StartEditorServerOptions = {
  app: RequestListener;
  host?: string;
  port?: number;
};

export type EditorServerHandle = {
  url: string;
  port: number;
  close: () => Promise<void>;
};

const DEFAULT_HOST = "127.0.0.1";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function startEditorServer(
  options: StartEditorServerOptions,
): Promise<EditorServerHandle> {
  const host = options.host ?? DEFAULT_HOST;
  const port = options.port ?? 0;
  try {
    if (!Number.isInteger(port) || port < 0) {
      throw createServerInputError("Port must be a non-negative integer.");
    }

    const server = http.createServer(options.app);
    await listen(server, host, port);

    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Unable to determine editor server address.");
    }

    return {
      url: `http://${formatHost(host)}:${address.port}`,
      port: address.port,
      close: () => closeServer(server),
    };
  } catch (error) {
    throw createServerStartError(error, port);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const SERVER_START_TITLE = "Editor server failed to start.";

function createServerInputError(message: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: SERVER_START_TITLE,
    message,
  });
}

function createServerStartError(error: unknown, port: number): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: SERVER_START_TITLE,
    message: resolveStartMessage(port),
    hint: resolveStartHint(error),
    cause: error,
  });
}

function resolveStartMessage(port: number): string {
  if (!Number.isFinite(port) || port === 0) {
    return "Unable to start the editor server.";
  }

  return `Unable to start the editor server on port ${port}.`;
}

function resolveStartHint(error: unknown): string | undefined {
  const code = resolveErrorCode(error);
  if (code === "EADDRINUSE") {
    return "Port is already in use. Choose another with --port.";
  }
  if (code === "EACCES") {
    return "Permission denied binding the port. Choose another with --port.";
  }
  return undefined;
}

function resolveErrorCode(error: unknown): string | null {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

// IPv6 literals need brackets inside a URL.
function formatHost(host: string): string {
  return host.includes(":") ? `[${host}]` : host;
}

function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("error", onError);
      reject(err);
    };

    server.once("error", onError);
    server.listen({ host, port }, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
    server.closeIdleConnections();
  });
}

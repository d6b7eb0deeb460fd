/*
 * HTTP surface of the connection editor: page, upload, save and download routes.
 * Assumptions: one process owns the storage root; sessions live in the injected SessionStore.
 * Error bodies are always { error: string } with the status chosen per route.
 */

import { randomUUID } from "node:crypto";
import path from "node:path";

import express, {
  type ErrorRequestHandler,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import fse from "fs-extra";
import multer from "multer";
import { z } from "zod";

import { formatSchemaIssues, type ServerConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { UserFacingError, httpStatusForCode } from "../core/errors.js";
import { logEvent, type EventLogger } from "../core/logger.js";
import {
  findPackageRoot,
  hasAllowedExtension,
  originalArtifactPath,
  resolveRootEntry,
  secureFilename,
  uploadDir,
  type StoragePaths,
} from "../core/paths.js";
import { writeExports } from "../export/emitter.js";
import { enforceReferencePolicy } from "../export/references.js";
import { loadArtifact } from "../extraction/pipeline.js";
import { ConnectionListSchema } from "../model/schema.js";
import type { SessionStore, UploadSession } from "../session/session-store.js";

// =============================================================================
// TYPES
// =============================================================================

export type EditorAppOptions = {
  config: ServerConfig;
  paths: StoragePaths;
  sessions: SessionStore;
  log: EventLogger;
  // Directory holding index.html; defaults to <package>/public.
  staticRoot?: string;
};

const UPLOAD_FIELD = "file";
const DEFAULT_UPLOAD_NAME = "project";

const SaveConnectionsBodySchema = z.object({
  upload_id: z.string().optional(),
  connections: ConnectionListSchema.default([]),
});

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

// =============================================================================
// APP
// =============================================================================

export function createEditorApp(options: EditorAppOptions): express.Express {
  const { config, paths, sessions, log } = options;
  const staticRoot = options.staticRoot ?? path.join(findPackageRoot(), "public");

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.max_upload_bytes, files: 1 },
  });

  const app = express();
  app.disable("x-powered-by");

  app.get("/", (_req, res) => {
    res.sendFile(path.join(staticRoot, "index.html"));
  });

  app.post(
    "/upload_proteus",
    asyncRoute(async (req, res) => {
      await receiveSingleFile(upload.single(UPLOAD_FIELD), req, res);

      const file = req.file;
      if (!file) throw new HttpError(400, "No file uploaded");
      if (!file.originalname) throw new HttpError(400, "No file selected");
      if (!hasAllowedExtension(file.originalname, config.allowed_extensions)) {
        throw new HttpError(400, `Please upload a ${config.allowed_extensions.join(" or ")} file`);
      }

      try {
        const uploadId = randomUUID();
        const filename = secureFilename(file.originalname) || DEFAULT_UPLOAD_NAME;
        const artifactPath = originalArtifactPath(paths, uploadId, filename);
        await fse.outputFile(artifactPath, file.buffer);

        const loaded = await loadArtifact(artifactPath, log);
        const { evicted } = sessions.create({
          uploadId,
          artifactPath,
          filename,
          classification: loaded.classification,
          components: loaded.components,
        });
        await discardEvictedUploads(paths, evicted, log);
        logEvent(log, "http.upload.complete", {
          upload_id: uploadId,
          filename,
          source: loaded.source,
          components: loaded.components.length,
        });

        res.json({
          status: "success",
          message: `Successfully parsed ${loaded.components.length} components from ${filename}`,
          upload_id: uploadId,
          components: loaded.components,
          filename,
          file_info: loaded.classification,
        });
      } catch (err) {
        throw new HttpError(500, `Error processing file: ${formatErrorMessage(err)}`);
      }
    }),
  );

  app.post(
    "/save_connections",
    express.json({ limit: config.max_upload_bytes }),
    asyncRoute(async (req, res) => {
      const parsed = SaveConnectionsBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new HttpError(
          400,
          `Invalid request body: ${formatSchemaIssues(parsed.error.issues).join("; ")}`,
        );
      }

      const session = sessions.require(parsed.data.upload_id);
      const { connections } = parsed.data;
      enforceReferencePolicy(config.connection_references, session.components, connections, log);

      try {
        sessions.replaceConnections(session.uploadId, connections);
        const summary = await writeExports({
          artifactPath: session.artifactPath,
          connections,
          outputDir: paths.root,
          log,
        });

        res.json({
          status: "success",
          message: "Proteus-compatible file created successfully!",
          updated_file: summary.updated_file,
          files: summary.files,
          connections_count: summary.connections_count,
        });
      } catch (err) {
        throw new HttpError(500, `Error saving connections: ${formatErrorMessage(err)}`);
      }
    }),
  );

  app.get(
    "/download_proteus/:filename",
    asyncRoute(async (req, res) => {
      const target = resolveRootEntry(paths.root, req.params.filename ?? "");
      const stat = target ? await fse.stat(target).catch(() => null) : null;
      if (!target || !stat?.isFile()) {
        throw new HttpError(404, "File not found");
      }

      await new Promise<void>((resolve, reject) => {
        res.download(target, path.basename(target), (err) => (err ? reject(err) : resolve()));
      });
    }),
  );

  app.use(createErrorHandler(log));
  return app;
}

// =============================================================================
// INTERNALS
// =============================================================================

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function receiveSingleFile(middleware: RequestHandler, req: Request, res: Response): Promise<void> {
  return new Promise((resolve, reject) => {
    middleware(req, res, (err?: unknown) => (err ? reject(err) : resolve()));
  });
}

async function discardEvictedUploads(
  paths: StoragePaths,
  evicted: readonly UploadSession[],
  log: EventLogger,
): Promise<void> {
  for (const session of evicted) {
    await fse.remove(uploadDir(paths, session.uploadId));
    logEvent(log, "session.evicted", { upload_id: session.uploadId, filename: session.filename });
  }
}

function createErrorHandler(log: EventLogger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const { status, message } = resolveErrorResponse(err);
    logEvent(log, "http.request.fail", { method: req.method, path: req.path, status, message });
    res.status(status).json({ error: message });
  };
}

function resolveErrorResponse(err: unknown): { status: number; message: string } {
  if (err instanceof HttpError) {
    return { status: err.status, message: err.message };
  }
  if (err instanceof UserFacingError) {
    return { status: httpStatusForCode(err.code), message: err.message };
  }
  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_SIZE") {
      return { status: 413, message: "File too large" };
    }
    if (err.code === "LIMIT_UNEXPECTED_FILE") {
      return { status: 400, message: "No file uploaded" };
    }
    return { status: 400, message: err.message };
  }
  if (isBodyParseError(err)) {
    return { status: 400, message: "Invalid JSON body" };
  }
  return { status: 500, message: formatErrorMessage(err) };
}

function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

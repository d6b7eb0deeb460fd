/*
Purpose: in-memory upload sessions, one per uploaded project, keyed by an opaque upload id.
Assumptions: single process; sessions do not survive a restart. Oldest sessions are evicted first.
Usage: const { session, evicted } = store.create({ ... }); store.require(uploadId).
*/

import { randomUUID } from "node:crypto";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { ArtifactClassification, Component, Connection } from "../model/schema.js";

// =============================================================================
// TYPES
// =============================================================================

export type UploadSession = {
  uploadId: string;
  artifactPath: string;
  filename: string;
  classification: ArtifactClassification;
  components: Component[];
  connections: Connection[];
  createdAt: Date;
};

export type CreateSessionInput = Omit<UploadSession, "uploadId" | "connections" | "createdAt"> & {
  uploadId?: string;
};

// Sessions pushed out by a create; their stored uploads are the caller's to discard.
export type CreatedSession = {
  session: UploadSession;
  evicted: UploadSession[];
};

export type SessionStoreOptions = {
  maxSessions: number;
  now?: () => Date;
};

export const NO_SESSION_MESSAGE = "No project file loaded";

// =============================================================================
// STORE
// =============================================================================

export class SessionStore {
  // Map iteration order is insertion order, so the first key is the oldest session.
  private readonly sessions = new Map<string, UploadSession>();
  private readonly now: () => Date;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.sessions.size;
  }

  create(input: CreateSessionInput): CreatedSession {
    const session: UploadSession = {
      uploadId: input.uploadId ?? randomUUID(),
      artifactPath: input.artifactPath,
      filename: input.filename,
      classification: input.classification,
      components: input.components,
      connections: [],
      createdAt: this.now(),
    };

    this.sessions.set(session.uploadId, session);
    return { session, evicted: this.evictOverflow() };
  }

  get(uploadId: string | undefined): UploadSession | undefined {
    return uploadId ? this.sessions.get(uploadId) : undefined;
  }

  require(uploadId: string | undefined): UploadSession {
    const session = this.get(uploadId);
    if (!session) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.session,
        title: "Upload session not found.",
        message: NO_SESSION_MESSAGE,
        hint: "Upload the project file again before saving connections.",
      });
    }
    return session;
  }

  replaceConnections(uploadId: string, connections: Connection[]): UploadSession {
    const session = this.require(uploadId);
    session.connections = connections;
    return session;
  }

  private evictOverflow(): UploadSession[] {
    const evicted: UploadSession[] = [];
    for (const [uploadId, session] of this.sessions) {
      if (this.sessions.size <= this.options.maxSessions) break;
      this.sessions.delete(uploadId);
      evicted.push(session);
    }
    return evicted;
  }
}

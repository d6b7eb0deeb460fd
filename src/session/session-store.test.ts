import { describe, expect, it } from "vitest";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { createFallbackComponents } from "../extraction/fallback.js";
import type { ArtifactClassification } from "../model/schema.js";

import { NO_SESSION_MESSAGE, SessionStore, type CreateSessionInput } from "./session-store.js";

const CLASSIFICATION: ArtifactClassification = {
  size: 10,
  file_signature: "50 4B",
  container: "archive",
  is_archive: true,
  is_structured_text: false,
  encoding: "Unknown",
  content_preview: "ZIP contains: PROJECT.XML",
  format: "ZIP Archive (Proteus 8+)",
  version: "Proteus 8.x",
};

function sessionInput(uploadId?: string): CreateSessionInput {
  return {
    uploadId,
    artifactPath: `/tmp/originals/${uploadId ?? "x"}/board.pdsprj`,
    filename: "board.pdsprj",
    classification: CLASSIFICATION,
    components: createFallbackComponents(),
  };
}

describe("SessionStore", () => {
  it("creates sessions with empty connections", () => {
    const created = new Date(2024, 0, 2);
    const store = new SessionStore({ maxSessions: 4, now: () => created });

    const { session, evicted } = store.create(sessionInput("upload-a"));

    expect(evicted).toEqual([]);
    expect(session.uploadId).toBe("upload-a");
    expect(session.connections).toEqual([]);
    expect(session.createdAt).toBe(created);
    expect(store.get("upload-a")).toBe(session);
  });

  it("assigns a random id when none is given", () => {
    const store = new SessionStore({ maxSessions: 4 });

    const { session } = store.create(sessionInput());

    expect(session.uploadId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it("reports a missing session as a session error", () => {
    const store = new SessionStore({ maxSessions: 4 });

    for (const uploadId of ["nope", undefined]) {
      let caught: unknown;
      try {
        store.require(uploadId);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(UserFacingError);
      if (caught instanceof UserFacingError) {
        expect(caught.code).toBe(USER_FACING_ERROR_CODES.session);
        expect(caught.message).toBe(NO_SESSION_MESSAGE);
      }
    }
  });

  it("replaces the connection list wholesale", () => {
    const store = new SessionStore({ maxSessions: 4 });
    store.create(sessionInput("upload-a"));
    const first = [{ from_component: "IC1", from_pin: "D13", to_component: "R1", to_pin: "1" }];

    store.replaceConnections("upload-a", first);
    const session = store.replaceConnections("upload-a", []);

    expect(session.connections).toEqual([]);
  });

  it("evicts the oldest sessions beyond the limit", () => {
    const store = new SessionStore({ maxSessions: 2 });

    const first = store.create(sessionInput("a")).session;
    store.create(sessionInput("b"));
    const { evicted } = store.create(sessionInput("c"));

    expect(evicted).toEqual([first]);
    expect(store.size).toBe(2);
    expect(store.get("a")).toBeUndefined();
    expect(store.get("b")?.uploadId).toBe("b");
    expect(store.get("c")?.uploadId).toBe("c");
  });
});

import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  createStoragePaths,
  fileExtension,
  findPackageRoot,
  hasAllowedExtension,
  originalArtifactPath,
  resolveRootEntry,
  secureFilename,
  uploadDir,
} from "./paths.js";

describe("secureFilename", () => {
  it("joins whitespace runs with underscores", () => {
    expect(secureFilename("My  Project.pdsprj")).toBe("My_Project.pdsprj");
  });

  it("removes path components", () => {
    expect(secureFilename("../../etc/passwd")).toBe("etc_passwd");
    expect(secureFilename("C:\\designs\\board.pdsprj")).toBe("C_designs_board.pdsprj");
  });

  it("drops accents and disallowed characters", () => {
    expect(secureFilename("résumé (v2).pdsprj")).toBe("resume_v2.pdsprj");
  });

  it("strips leading and trailing dots and underscores", () => {
    expect(secureFilename("._hidden.pdsprj_")).toBe("hidden.pdsprj");
  });
});

describe("storage paths", () => {
  it("lays out originals and logs under the storage root", () => {
    const paths = createStoragePaths("uploads", "/srv/app");

    expect(paths.root).toBe(path.resolve("/srv/app/uploads"));
    expect(paths.originalsDir).toBe(path.join(paths.root, "originals"));
    expect(paths.logsDir).toBe(path.join(paths.root, "logs"));
    expect(originalArtifactPath(paths, "abc", "board.pdsprj")).toBe(
      path.join(paths.root, "originals", "abc", "board.pdsprj"),
    );
    expect(uploadDir(paths, "abc")).toBe(path.join(paths.root, "originals", "abc"));
  });

  it("resolves names inside the root only", () => {
    const root = path.resolve("/srv/app/uploads");

    expect(resolveRootEntry(root, "netlist.net")).toBe(path.join(root, "netlist.net"));
    expect(resolveRootEntry(root, "../secret.txt")).toBeNull();
    expect(resolveRootEntry(root, "/etc/passwd")).toBeNull();
    expect(resolveRootEntry(root, "")).toBeNull();
    expect(resolveRootEntry(root, "..")).toBeNull();
  });

  it("resolves top-level entries only", () => {
    const root = path.resolve("/srv/wirebridge");

    expect(resolveRootEntry(root, "..hidden.net")).toBe(path.join(root, "..hidden.net"));
    expect(resolveRootEntry(root, "logs/../guide.txt")).toBe(path.join(root, "guide.txt"));
    expect(resolveRootEntry(root, "logs/events.jsonl")).toBeNull();
    expect(resolveRootEntry(root, "originals/upload-a/board.pdsprj")).toBeNull();
  });

  it("finds the package root from a nested directory", () => {
    const root = findPackageRoot();

    expect(findPackageRoot(path.join(root, "src", "core"))).toBe(root);
  });
});

describe("extensions", () => {
  it("matches allowed extensions case-insensitively", () => {
    expect(hasAllowedExtension("BOARD.PDSPRJ", [".pdsprj"])).toBe(true);
    expect(hasAllowedExtension("board.zip", [".pdsprj"])).toBe(false);
  });

  it("returns the extension without its dot", () => {
    expect(fileExtension("/tmp/board.pdsprj")).toBe("pdsprj");
    expect(fileExtension("/tmp/noext")).toBe("");
  });
});

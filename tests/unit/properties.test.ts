import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

// Mock the name-service query before importing the module under test
vi.mock("../../src/utils/process.js", () => ({
  runCommand: vi.fn(),
}));

import { runCommand, type SpawnResult } from "../../src/utils/process.js";
import {
  applyProperties,
  lookupId,
  resolveOwnership,
  type IdDatabases,
} from "../../src/writer/properties.js";
import { OwnershipError } from "../../src/core/errors.js";

const mockRunCommand = vi.mocked(runCommand);

function getentResult(overrides: Partial<SpawnResult> = {}): SpawnResult {
  return {
    stdout: "",
    stderr: "",
    exitCode: 2,
    signal: null,
    timedOut: false,
    ...overrides,
  };
}

const PASSWD = `# local accounts
root:x:0:0:root:/root:/bin/bash

deploy:x:1001:1001:Deploy:/home/deploy:/bin/sh
broken:x:notanumber:10::/:/bin/false
`;

const GROUP = `root:x:0:
www-data:x:33:deploy
`;

describe("properties", () => {
  let tmpDir: string;
  let databases: IdDatabases;

  beforeEach(async () => {
    vi.clearAllMocks();
    mockRunCommand.mockResolvedValue(getentResult());
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "stagewrite-props-"));
    databases = {
      passwdPath: path.join(tmpDir, "passwd"),
      groupPath: path.join(tmpDir, "group"),
    };
    await fs.writeFile(databases.passwdPath, PASSWD);
    await fs.writeFile(databases.groupPath, GROUP);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("lookupId", () => {
    it("finds the id in the third field", () => {
      expect(lookupId(PASSWD, "deploy")).toBe(1001);
      expect(lookupId(GROUP, "www-data")).toBe(33);
    });

    it("returns null for unknown names and non-numeric ids", () => {
      expect(lookupId(PASSWD, "nobody-here")).toBeNull();
      expect(lookupId(PASSWD, "broken")).toBeNull();
    });

    it("does not match on a name prefix", () => {
      expect(lookupId(PASSWD, "dep")).toBeNull();
    });
  });

  describe("resolveOwnership", () => {
    it("returns null when neither user nor group is given", async () => {
      expect(await resolveOwnership(undefined, undefined, databases)).toBeNull();
    });

    it("resolves names from the databases", async () => {
      expect(await resolveOwnership("deploy", "www-data", databases)).toEqual({
        uid: 1001,
        gid: 33,
      });
    });

    it("leaves the unspecified id unchanged", async () => {
      expect(await resolveOwnership("deploy", undefined, databases)).toEqual({
        uid: 1001,
        gid: -1,
      });
      expect(await resolveOwnership(undefined, "root", databases)).toEqual({
        uid: -1,
        gid: 0,
      });
    });

    it("uses numeric strings as ids directly", async () => {
      expect(await resolveOwnership("4242", "77", databases)).toEqual({
        uid: 4242,
        gid: 77,
      });
    });

    it("rejects unknown names", async () => {
      await expect(resolveOwnership(undefined, "staff", databases)).rejects.toThrow(
        new OwnershipError("No such group: staff", "group", "staff"),
      );
    });

    it("does not ask the name service when the local files know the name", async () => {
      await resolveOwnership("deploy", "www-data", databases);

      expect(mockRunCommand).not.toHaveBeenCalled();
    });

    it("falls back to getent for names missing from the local files", async () => {
      mockRunCommand.mockResolvedValueOnce(
        getentResult({
          stdout: "ldapuser:*:5001:5001:Directory User:/home/ldapuser:/bin/sh\n",
          exitCode: 0,
        }),
      );

      expect(await resolveOwnership("ldapuser", undefined, databases)).toEqual({
        uid: 5001,
        gid: -1,
      });
      expect(mockRunCommand).toHaveBeenCalledWith("getent", ["passwd", "ldapuser"], {
        timeoutMs: 5000,
      });
    });

    it("queries the group database for groups", async () => {
      mockRunCommand.mockResolvedValueOnce(
        getentResult({ stdout: "ldapgroup:*:7001:alice,bob\n", exitCode: 0 }),
      );

      expect(await resolveOwnership(undefined, "ldapgroup", databases)).toEqual({
        uid: -1,
        gid: 7001,
      });
      expect(mockRunCommand).toHaveBeenCalledWith("getent", ["group", "ldapgroup"], {
        timeoutMs: 5000,
      });
    });

    it("uses getent when the local database file is missing", async () => {
      await fs.rm(databases.passwdPath);
      mockRunCommand.mockResolvedValueOnce(
        getentResult({ stdout: "deploy:x:1001:1001::/home/deploy:/bin/sh\n", exitCode: 0 }),
      );

      expect(await resolveOwnership("deploy", undefined, databases)).toEqual({
        uid: 1001,
        gid: -1,
      });
    });

    it("reports an unknown name when getent is not installed", async () => {
      mockRunCommand.mockRejectedValueOnce(
        Object.assign(new Error("spawn getent ENOENT"), { code: "ENOENT" }),
      );

      await expect(resolveOwnership("ghost", undefined, databases)).rejects.toThrow(
        "No such user: ghost",
      );
    });

    it("reports a name-service timeout", async () => {
      mockRunCommand.mockResolvedValueOnce(
        getentResult({ exitCode: null, signal: "SIGTERM", timedOut: true }),
      );

      await expect(resolveOwnership("slow", undefined, databases)).rejects.toThrow(
        'Looking up user "slow" timed out after 5000ms',
      );
    });
  });

  describe("applyProperties", () => {
    it("sets the mode", async () => {
      const file = path.join(tmpDir, "target");
      await fs.writeFile(file, "");

      await applyProperties(file, 0o640, null);

      expect((await fs.stat(file)).mode & 0o777).toBe(0o640);
    });

    it.skipIf(process.platform === "win32")("sets ownership when given", async () => {
      const file = path.join(tmpDir, "target");
      await fs.writeFile(file, "");
      const uid = process.getuid ? process.getuid() : 0;

      await applyProperties(file, 0o600, { uid, gid: -1 });

      expect((await fs.stat(file)).uid).toBe(uid);
    });
  });
});

import fs from "node:fs/promises";
import { OwnershipError, isErrnoException } from "../core/errors.js";
import type { Ownership } from "../core/types.js";
import { runCommand, type SpawnResult } from "../utils/process.js";

export interface IdDatabases {
  passwdPath: string;
  groupPath: string;
}

export const SYSTEM_ID_DATABASES: IdDatabases = {
  passwdPath: "/etc/passwd",
  groupPath: "/etc/group",
};

const NUMERIC_ID = /^\d+$/;

/**
 * Finds the numeric id for `name` in passwd/group formatted content
 * (`name:password:id:...`). Blank lines and `#` comments are skipped.
 */
export function lookupId(content: string, name: string): number | null {
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    const fields = trimmed.split(":");
    if (fields.length < 3 || fields[0] !== name) continue;

    const id = fields[2];
    if (NUMERIC_ID.test(id)) {
      return parseInt(id, 10);
    }
  }
  return null;
}

const NAME_SERVICE_TIMEOUT_MS = 5000;

async function readDatabase(databasePath: string): Promise<string> {
  try {
    return await fs.readFile(databasePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return "";
    throw err;
  }
}

/**
 * Asks the system name service (`getent`), which also knows accounts from
 * LDAP, sssd or systemd-userdb. Returns null when the name is unknown or
 * `getent` is not installed.
 */
async function queryNameService(
  kind: "user" | "group",
  name: string,
): Promise<number | null> {
  const database = kind === "user" ? "passwd" : "group";
  let result: SpawnResult;
  try {
    result = await runCommand("getent", [database, name], {
      timeoutMs: NAME_SERVICE_TIMEOUT_MS,
    });
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }

  if (result.timedOut) {
    throw new OwnershipError(
      `Looking up ${kind} "${name}" timed out after ${NAME_SERVICE_TIMEOUT_MS}ms`,
      kind,
      name,
    );
  }
  if (result.exitCode !== 0) return null;
  return lookupId(result.stdout, name);
}

async function resolveId(
  kind: "user" | "group",
  value: string | undefined,
  databasePath: string,
): Promise<number> {
  if (value === undefined) return -1;
  if (NUMERIC_ID.test(value)) return parseInt(value, 10);

  const id =
    lookupId(await readDatabase(databasePath), value) ??
    (await queryNameService(kind, value));
  if (id === null) {
    throw new OwnershipError(`No such ${kind}: ${value}`, kind, value);
  }
  return id;
}

/**
 * Resolves user/group names (or numeric strings) to ids. Returns `null` when
 * neither is set, meaning ownership is left alone.
 */
export async function resolveOwnership(
  user: string | undefined,
  group: string | undefined,
  databases: IdDatabases = SYSTEM_ID_DATABASES,
): Promise<Ownership | null> {
  if (user === undefined && group === undefined) return null;
  return {
    uid: await resolveId("user", user, databases.passwdPath),
    gid: await resolveId("group", group, databases.groupPath),
  };
}

export async function applyProperties(
  target: string,
  mode: number,
  ownership: Ownership | null,
): Promise<void> {
  await fs.chmod(target, mode);
  if (ownership) {
    await fs.chown(target, ownership.uid, ownership.gid);
  }
}

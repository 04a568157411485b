import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { isErrnoException } from "./errors.js";

const CONFIG_FILE = "stagewrite.yaml";

export function getConfigPath(base: string = process.cwd()): string {
  return path.resolve(base, CONFIG_FILE);
}

export function expandHome(target: string): string {
  if (target === "~") return os.homedir();
  if (target.startsWith("~/") || target.startsWith(`~${path.sep}`)) {
    // Joined as text so `..` is left for resolveDestination to apply after symlinks.
    return `${os.homedir()}${path.sep}${target.slice(2)}`;
  }
  return target;
}

const MAX_SYMLINK_HOPS = 40;

const SEPARATORS = process.platform === "win32" ? /[\\/]+/ : /\/+/;

function segments(p: string): string[] {
  return p.split(SEPARATORS).filter((segment) => segment !== "");
}

/**
 * Turns `target` into an absolute path with `~` expanded, resolving symlinks
 * segment by segment before `..` is applied. A symlink whose target does not
 * exist is still followed. Segments that do not exist yet are appended as-is,
 * so the result is usable before the file or its parents are created.
 */
export async function resolveDestination(
  target: string,
  base: string = process.cwd(),
): Promise<string> {
  const expanded = expandHome(target);
  const joined = path.isAbsolute(expanded)
    ? expanded
    : `${path.resolve(base)}${path.sep}${expanded}`;
  const root = path.parse(joined).root;

  // Stack of segments still to walk; the next one is on top.
  const pending = segments(joined.slice(root.length)).reverse();
  let resolved = root;
  let hops = 0;

  while (pending.length > 0) {
    const name = pending.pop();
    if (name === undefined || name === ".") continue;
    if (name === "..") {
      resolved = path.dirname(resolved);
      continue;
    }

    const next = path.join(resolved, name);
    let isLink: boolean;
    try {
      isLink = (await fs.lstat(next)).isSymbolicLink();
    } catch (err) {
      if (!isErrnoException(err) || (err.code !== "ENOENT" && err.code !== "ENOTDIR")) {
        throw err;
      }
      resolved = next;
      continue;
    }

    if (!isLink) {
      resolved = next;
      continue;
    }

    hops += 1;
    if (hops > MAX_SYMLINK_HOPS) {
      throw Object.assign(new Error(`Too many levels of symbolic links: ${joined}`), {
        code: "ELOOP",
      });
    }
    const link = await fs.readlink(next);
    if (path.isAbsolute(link)) {
      resolved = path.parse(link).root;
      pending.push(...segments(link.slice(resolved.length)).reverse());
    } else {
      pending.push(...segments(link).reverse());
    }
  }

  return resolved;
}

/**
 * Ancestors of `dir`, shallowest first, ending with `dir` itself.
 * `/a/b/c` gives `["/", "/a", "/a/b", "/a/b/c"]`.
 */
export function ancestorChain(dir: string): string[] {
  const chain: string[] = [];
  let current = path.resolve(dir);
  for (;;) {
    chain.push(current);
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return chain.reverse();
}

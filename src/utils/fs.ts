import fs from "node:fs/promises";

export async function syncFile(filePath: string): Promise<void> {
  const handle = await fs.open(filePath, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

// Windows cannot open a directory for flushing.
export async function syncDirectory(dir: string): Promise<void> {
  if (process.platform === "win32") return;
  await syncFile(dir);
}

export async function removeTree(target: string): Promise<void> {
  await fs.rm(target, { recursive: true, force: true });
}

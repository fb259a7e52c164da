import fs from "node:fs";
import path from "node:path";

/**
 * Runs `fn` inside a fresh private directory under `rootDir` and removes the
 * directory on every exit path.
 */
export async function withWorkspace<T>(rootDir: string, prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  await fs.promises.mkdir(rootDir, { recursive: true });
  const dir = await fs.promises.mkdtemp(path.join(rootDir, `${prefix}-`));
  try {
    return await fn(dir);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
  }
}

export function documentPath(workDir: string, docId: string): string {
  return path.join(workDir, `${docId}.pdf`);
}

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import type { WorkspacePort } from "../../interfaces/ports";

const PREFIX = "job-";

export class LocalWorkspace implements WorkspacePort {
  constructor(private readonly baseDir: string) {}

  async create(jobId: string) {
    await fs.mkdir(this.baseDir, { recursive: true });
    const dir = path.join(this.baseDir, `${PREFIX}${jobId.slice(0, 8)}-${randomBytes(4).toString("hex")}`);
    await fs.mkdir(dir);
    return dir;
  }

  async remove(dir: string) {
    const resolved = path.resolve(dir);
    if (path.dirname(resolved) !== path.resolve(this.baseDir) || !path.basename(resolved).startsWith(PREFIX)) {
      throw new Error(`Refusing to remove ${dir}: not a job workspace.`);
    }
    await fs.rm(resolved, { recursive: true, force: true });
  }

  /** Removes leftover job directories; only call before any job starts. */
  async sweepOrphans() {
    const entries = await fs.readdir(this.baseDir, { withFileTypes: true }).catch((error: NodeJS.ErrnoException) => {
      if (error.code === "ENOENT") {
        return [];
      }
      throw error;
    });
    let removed = 0;
    for (const entry of entries) {
      if (entry.isDirectory() && entry.name.startsWith(PREFIX)) {
        await fs.rm(path.join(this.baseDir, entry.name), { recursive: true, force: true });
        removed += 1;
      }
    }
    return removed;
  }

  async fileSize(filePath: string) {
    const stats = await fs.stat(filePath).catch((error: NodeJS.ErrnoException) => {
      if (error.code === "ENOENT") {
        return null;
      }
      throw error;
    });
    return stats?.size ?? 0;
  }
}

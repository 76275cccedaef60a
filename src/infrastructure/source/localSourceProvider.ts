import { promises as fs } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { SourceError } from "../../domain/errors";
import type { SourceProviderPort } from "../../interfaces/ports";

/**
 * Sources are files in the uploads directory, addressed by name; published
 * clips are copied into the outputs directory, one folder per folder id.
 */
export class LocalSourceProvider implements SourceProviderPort {
  constructor(
    private readonly uploadsDir: string,
    private readonly outputsDir: string
  ) {}

  async download(options: { sourceId: string; destination: string; maxBytes: number }) {
    const filePath = path.join(this.uploadsDir, safeName(options.sourceId, "source id"));
    const stats = await fs.stat(filePath).catch((error: NodeJS.ErrnoException) => {
      if (error.code === "ENOENT") {
        return null;
      }
      throw new SourceError(`Cannot read source ${options.sourceId}: ${error.message}`, { cause: error });
    });
    if (!stats?.isFile()) {
      throw new SourceError(`Source ${options.sourceId} not found.`);
    }
    if (stats.size === 0) {
      throw new SourceError(`Source ${options.sourceId} is empty.`);
    }
    if (stats.size > options.maxBytes) {
      throw new SourceError(
        `Source ${options.sourceId} is ${toMb(stats.size)} MB, over the ${toMb(options.maxBytes)} MB limit.`
      );
    }

    try {
      await fs.copyFile(filePath, options.destination);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new SourceError(`Copying source ${options.sourceId} failed: ${message}`, { cause: error });
    }
    return { bytes: stats.size };
  }

  async upload(options: { filePath: string; fileName: string; folderId?: string | null }) {
    const folder = options.folderId ? safeName(options.folderId, "folder id") : "default";
    const fileName = safeName(options.fileName, "file name");
    const targetDir = path.join(this.outputsDir, folder);
    const target = path.join(targetDir, fileName);
    try {
      await fs.mkdir(targetDir, { recursive: true });
      await fs.copyFile(options.filePath, target);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new SourceError(`Publishing ${fileName} failed: ${message}`, { cause: error });
    }
    return { fileId: `${folder}/${fileName}`, fileName, link: pathToFileURL(target).href };
  }
}

function safeName(value: string, label: string) {
  if (!value || value !== path.basename(value) || value === "." || value === "..") {
    throw new SourceError(`Invalid ${label}: ${value}`);
  }
  return value;
}

function toMb(bytes: number) {
  return (bytes / 1024 / 1024).toFixed(1);
}

import { promises as fs } from "fs";
import path from "path";
import type { LoggerPort } from "../../interfaces/ports";

type LogLevel = "info" | "warn" | "error";

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  jobId: string;
  message: string;
  pid: number;
};

export class LocalLogger implements LoggerPort {
  constructor(
    private baseDir: string,
    private echo = process.env.LOG_TO_CONSOLE === "true"
  ) {}

  async info(jobId: string, message: string) {
    await this.append(jobId, "info", message);
  }

  async warn(jobId: string, message: string) {
    await this.append(jobId, "warn", message);
  }

  async error(jobId: string, message: string) {
    await this.append(jobId, "error", message);
  }

  private async append(jobId: string, level: LogLevel, message: string) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      jobId,
      message,
      pid: process.pid
    };
    if (this.echo) {
      console[level](`[${jobId}] ${message}`);
    }

    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.appendFile(path.join(this.baseDir, `${jobId}.log`), `${JSON.stringify(entry)}\n`);
    } catch (error) {
      console.error("Logger write failed", error);
    }
  }
}

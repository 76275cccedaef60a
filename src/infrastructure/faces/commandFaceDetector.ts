import { spawn } from "node:child_process";
import { z } from "zod";
import type { FaceDetectorPort } from "../../interfaces/ports";

const outputSchema = z.object({
  positions: z.array(z.number().min(0).max(1).nullable())
});

/**
 * Delegates detection to an external program, called as
 * `<command> --input <file> --start <s> --end <s> --fps <n>`, which prints
 * `{"positions": [0.42, null, ...]}`: the dominant face center per sampled frame.
 */
export class CommandFaceDetector implements FaceDetectorPort {
  constructor(
    private command: string,
    private timeoutMs = 300_000
  ) {}

  async sample(options: { inputPath: string; start: number; end: number; sampleFps: number }) {
    const [program, ...baseArgs] = this.command.split(/\s+/).filter(Boolean);
    if (!program) {
      throw new Error("Face detector command is empty.");
    }
    const args = [
      ...baseArgs,
      "--input",
      options.inputPath,
      "--start",
      options.start.toFixed(3),
      "--end",
      options.end.toFixed(3),
      "--fps",
      String(options.sampleFps)
    ];
    const stdout = await run(program, args, this.timeoutMs);
    return parseFaceOutput(stdout);
  }
}

export function parseFaceOutput(stdout: string) {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new Error("Face detector printed invalid JSON.");
  }
  const parsed = outputSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error("Face detector output has an unexpected shape.");
  }
  return parsed.data.positions;
}

function run(program: string, args: string[], timeoutMs: number) {
  return new Promise<string>((resolve, reject) => {
    let stdout = "";
    let stderr = "";
    const proc = spawn(program, args, { stdio: ["ignore", "pipe", "pipe"] });
    const timeout = setTimeout(() => proc.kill("SIGKILL"), timeoutMs);
    proc.stdout.on("data", (data: Buffer) => (stdout += data.toString()));
    proc.stderr.on("data", (data: Buffer) => {
      stderr = (stderr + data.toString()).slice(-2000);
    });
    proc.on("error", (error) => {
      clearTimeout(timeout);
      reject(new Error(`Face detector failed to start: ${error.message}`));
    });
    proc.on("close", (code) => {
      clearTimeout(timeout);
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new Error(`Face detector exited with code ${code ?? "unknown"}. ${stderr.trim()}`.trim()));
      }
    });
  });
}

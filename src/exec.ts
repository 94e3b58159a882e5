import { spawn, type StdioOptions } from "node:child_process";
import type { RunResult } from "./remote.js";

export interface CaptureOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  stdin?: "ignore" | "inherit";
  env?: NodeJS.ProcessEnv;
}

/**
 * Spawn a process and collect its output. Non-zero exit is reported in the
 * result, not thrown; spawn failures (ENOENT, abort) reject.
 */
export function spawnCapture(
  cmd: string,
  args: string[],
  { timeoutMs, signal, stdin = "ignore", env }: CaptureOptions = {},
): Promise<RunResult> {
  return new Promise<RunResult>((resolve, reject) => {
    const stdio: StdioOptions = [stdin, "pipe", "pipe"];
    const p = spawn(cmd, args, {
      stdio,
      signal,
      timeout: timeoutMs,
      env: env ?? process.env,
    });
    let stdout = "";
    let stderr = "";
    p.stdout?.setEncoding("utf8");
    p.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    p.stderr?.setEncoding("utf8");
    p.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });
    p.once("error", reject);
    p.once("close", (code, sig) => {
      if (code == null && sig) {
        stderr += `${stderr && !stderr.endsWith("\n") ? "\n" : ""}killed by ${sig}`;
      }
      resolve({ exitStatus: code, stdout, stderr });
    });
  });
}

/** Like spawnCapture but with the terminal attached (password prompts). */
export function spawnInteractive(cmd: string, args: string[]): Promise<number | null> {
  return new Promise<number | null>((resolve, reject) => {
    const p = spawn(cmd, args, { stdio: "inherit" });
    p.once("error", reject);
    p.once("exit", (code) => resolve(code));
  });
}

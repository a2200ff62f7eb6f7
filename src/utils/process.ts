import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;

function field(err: unknown, key: string): unknown {
  return typeof err === "object" && err !== null && key in err ? Reflect.get(err, key) : undefined;
}

export async function runCommand(command: string, args: string[], options?: RunOptions): Promise<RunResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      encoding: "utf8",
      maxBuffer: 64 * 1024 * 1024,
    });

    return { stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    const out = field(err, "stdout");
    const errOut = field(err, "stderr");
    const code = field(err, "code");
    const stdout = typeof out === "string" ? out : "";
    const stderr = typeof errOut === "string" && errOut ? errOut : err instanceof Error ? err.message : String(err);
    const exitCode = typeof code === "number" ? code : 1;
    const reason = field(err, "killed") === true ? "timed out" : `code=${exitCode}`;
    throw new Error(`Command failed (${command} ${args.join(" ")}): ${reason}\nSTDERR: ${stderr}\nSTDOUT: ${stdout}`, {
      cause: err,
    });
  }
}

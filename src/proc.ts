import { spawn, type ChildProcess } from "node:child_process";
import { CommandFailedError, CommandTimeoutError } from "./errors";

export type ExecResult = {
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  cwd?: string;
  timeoutMs?: number;
};

export async function execCmd(bin: string, args: string[], opts?: ExecOptions): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const p = spawn(bin, args, {
      cwd: opts?.cwd,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timer = opts?.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          p.kill("SIGKILL");
        }, opts.timeoutMs)
      : undefined;

    p.stdout.on("data", (d) => {
      stdout += String(d);
    });

    p.stderr.on("data", (d) => {
      stderr += String(d);
    });

    p.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    p.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut && opts?.timeoutMs) {
        reject(new CommandTimeoutError(bin, opts.timeoutMs));
        return;
      }
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      reject(new CommandFailedError(bin, code, stderr || stdout));
    });
  });
}

/** Starts `bin` as the leader of its own process group so the whole tree can be killed at once. */
export function spawnDetached(bin: string, args: string[]): ChildProcess {
  return spawn(bin, args, {
    detached: process.platform !== "win32",
    stdio: "ignore"
  });
}

export function isRunning(child: ChildProcess | null): child is ChildProcess {
  return child !== null && child.exitCode === null && child.signalCode === null;
}

export function killProcessTree(child: ChildProcess): void {
  if (!isRunning(child) || child.pid === undefined) {
    return;
  }
  if (process.platform === "win32") {
    spawn("taskkill", ["/PID", String(child.pid), "/T", "/F"], { stdio: "ignore" }).on("error", () => child.kill());
    return;
  }
  try {
    process.kill(-child.pid, "SIGTERM");
  } catch {
    child.kill("SIGTERM");
  }
}

export type BinaryProbe = {
  bin: string;
  versionArgs: string[];
};

/** Returns the first candidate that answers its version probe, or null. */
export async function findBinary(candidates: BinaryProbe[]): Promise<string | null> {
  for (const { bin, versionArgs } of candidates) {
    try {
      await execCmd(bin, versionArgs, { timeoutMs: 10_000 });
      return bin;
    } catch {
      // Try the next candidate.
    }
  }
  return null;
}

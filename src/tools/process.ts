/**
 * Child process helpers shared by the external tool wrappers
 */

import { spawn } from "node:child_process";
import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import * as path from "node:path";
import type { ToolResult } from "../types";
import { logger } from "../utils/logger";

const MAX_CAPTURED_OUTPUT = 64 * 1024;

function appendCapped(buffer: string, chunk: Buffer | string): string {
  if (buffer.length >= MAX_CAPTURED_OUTPUT) return buffer;
  const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
  return (buffer + text).slice(0, MAX_CAPTURED_OUTPUT);
}

/**
 * Run a command to completion and capture its output. Rejects only when the
 * process cannot be started; a non-zero exit is reported in the result.
 */
export async function runCommand(
  command: string,
  args: string[],
  options: { env?: NodeJS.ProcessEnv; cwd?: string } = {},
): Promise<ToolResult> {
  logger.debug(`Running: ${command} ${args.join(" ")}`);

  return await new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: options.env ?? process.env,
      cwd: options.cwd,
    });
    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (chunk: Buffer) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr = appendCapped(stderr, chunk);
    });

    child.on("error", reject);
    child.on("close", (code) => {
      const exitCode = code ?? 1;
      resolve({
        success: exitCode === 0,
        exitCode,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });
  });
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) return false;
    await access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check whether a command can be executed, either as a path or by searching
 * PATH the way a shell would.
 */
export async function commandExists(
  command: string,
  searchPath: string = process.env.PATH ?? "",
): Promise<boolean> {
  if (!command) return false;

  if (command.includes("/") || command.includes(path.sep)) {
    return isExecutableFile(path.resolve(command));
  }

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    if (await isExecutableFile(path.join(dir, command))) {
      return true;
    }
  }

  return false;
}

export function describeFailure(result: ToolResult): string {
  const detail = result.stderr || result.stdout;
  return detail ? `exit code ${result.exitCode}: ${detail}` : `exit code ${result.exitCode}`;
}

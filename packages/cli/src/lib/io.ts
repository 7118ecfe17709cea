/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { parseJson } from "./arg.js";

/**
 * Where the CLI reads input and writes output
 */
export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
  isStdinTTY(): boolean;
  isStderrTTY(): boolean;
}

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJson(content, `file ${filePath}`);
}

/**
 * The real process streams
 */
export const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readStdin: () => readStdin(),
  isStdinTTY: () => process.stdin.isTTY ?? false,
  isStderrTTY: () => process.stderr.isTTY ?? false,
};

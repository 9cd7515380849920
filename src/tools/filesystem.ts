import fs from "node:fs/promises";
import path from "node:path";
import type { Tool, ToolRunContext } from "./types.js";

export type FileSystemOperation = "read" | "write" | "list" | "exists";

export type FileSystemArgs = {
  operation: FileSystemOperation;
  path: string;
  content?: string;
};

export interface FileSystemToolOptions {
  name?: string;
  /** Every path is resolved inside this directory. Defaults to the working directory. */
  basePath?: string;
  maxReadBytes?: number;
  allowWrite?: boolean;
}

const OPERATIONS: readonly FileSystemOperation[] = ["read", "write", "list", "exists"];
const DEFAULT_MAX_READ_BYTES = 64 * 1024;

export function createFileSystemTool(options: FileSystemToolOptions = {}): Tool<FileSystemArgs, string | boolean | string[]> {
  const basePath = path.resolve(options.basePath ?? process.cwd());
  const maxReadBytes = options.maxReadBytes ?? DEFAULT_MAX_READ_BYTES;
  const allowWrite = options.allowWrite ?? true;

  return {
    name: options.name?.trim() || "filesystem",
    description: "Perform file system operations like read, write, list files and check existence",
    schema: {
      operation: { type: "string", enum: OPERATIONS, required: true },
      path: { type: "string", description: "Path relative to the tool's base directory", required: true },
      content: { type: "string", description: "Content to write (write only)" },
    },
    async execute(args: FileSystemArgs, _ctx: ToolRunContext): Promise<string | boolean | string[]> {
      if (!args || !OPERATIONS.includes(args.operation)) {
        throw new Error(`Unsupported operation: ${String(args?.operation)}`);
      }
      if (typeof args.path !== "string" || args.path.trim() === "") {
        throw new Error("filesystem requires a path");
      }
      const target = resolveInside(basePath, args.path);

      switch (args.operation) {
        case "read": {
          const stats = await fs.stat(target).catch(() => undefined);
          if (!stats?.isFile()) {
            throw new Error(`File not found: ${args.path}`);
          }
          if (stats.size > maxReadBytes) {
            throw new Error(`File exceeds read limit of ${maxReadBytes} bytes`);
          }
          return fs.readFile(target, "utf-8");
        }
        case "write": {
          if (!allowWrite) {
            throw new Error("Writes are disabled for this tool");
          }
          await fs.mkdir(path.dirname(target), { recursive: true });
          await fs.writeFile(target, args.content ?? "", "utf-8");
          return `Successfully wrote to: ${args.path}`;
        }
        case "list": {
          const entries = await fs.readdir(target).catch(() => undefined);
          if (!entries) {
            throw new Error(`Directory not found: ${args.path}`);
          }
          return entries.sort();
        }
        case "exists": {
          return fs
            .access(target)
            .then(() => true)
            .catch(() => false);
        }
      }
    },
  };
}

function resolveInside(basePath: string, requested: string): string {
  const target = path.resolve(basePath, requested);
  const relative = path.relative(basePath, target);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error(`Path escapes the base directory: ${requested}`);
  }
  return target;
}

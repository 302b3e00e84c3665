import fs from "node:fs";
import path from "node:path";

import { makeCliError } from "./cli-error.js";

export interface LoadedDocument {
  path: string;
  markup: string;
}

const isSsmlFile = (file: string): boolean => file.endsWith(".ssml") || file.endsWith(".ssml.xml");

const toPosixPath = (filePath: string): string => filePath.split(path.sep).join("/");

export const readSsmlFile = (filePath: string): LoadedDocument => {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw makeCliError("CLI_FILE_NOT_FOUND", `SSML file does not exist: ${resolved}`);
  }
  return { path: resolved, markup: fs.readFileSync(resolved, "utf8") };
};

export const resolveSsmlDir = (dir: string): string => {
  const resolved = path.resolve(dir);
  if (!fs.existsSync(resolved)) {
    throw makeCliError("CLI_DIR_NOT_FOUND", `SSML directory does not exist: ${resolved}`);
  }
  if (!fs.statSync(resolved).isDirectory()) {
    throw makeCliError("CLI_DIR_NOT_FOUND", `SSML path is not a directory: ${resolved}`);
  }
  return resolved;
};

/**
 * Reads every `.ssml` / `.ssml.xml` file below `dir` in sorted order. Each
 * document's `path` is POSIX-style and relative to `dir`.
 */
export const readSsmlDir = (dir: string): LoadedDocument[] => {
  const root = resolveSsmlDir(dir);
  const collectFiles = (relativeDir = ""): string[] => {
    const fullDir = relativeDir ? path.join(root, relativeDir) : root;
    const entries = fs.readdirSync(fullDir, { withFileTypes: true });
    const collected: string[] = [];
    for (const entry of entries) {
      const relativePath = relativeDir ? path.join(relativeDir, entry.name) : entry.name;
      if (entry.isDirectory()) {
        collected.push(...collectFiles(relativePath));
        continue;
      }
      if (entry.isFile() && isSsmlFile(entry.name)) {
        collected.push(toPosixPath(relativePath));
      }
    }
    return collected;
  };

  const files = collectFiles().sort();
  if (files.length === 0) {
    throw makeCliError("CLI_DIR_EMPTY", `No .ssml files found in: ${root}`);
  }
  return files.map((file) => ({
    path: file,
    markup: fs.readFileSync(path.join(root, ...file.split("/")), "utf8"),
  }));
};

#!/usr/bin/env node

import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { runAgentCommand } from "./commands/agent.js";
import { runTreeCommand } from "./commands/tree.js";

type ModeHandler = (argv: string[]) => number | Promise<number>;

const modes: Record<string, ModeHandler> = {
  agent: runAgentCommand,
  tree: runTreeCommand,
};

export const SSML_TOOL_USAGE = `usage: ssml-tool <mode> [options]

modes:
  agent check (--file <path> | --dir <path> [--cache-size <n>])
  agent format --file <path> [--out <path>]
  agent text --file <path>
  tree --file <path> [--max-depth <n>]
`;

const isHelp = (mode: string | undefined): boolean =>
  mode === undefined || mode === "help" || mode === "--help" || mode === "-h";

export const runSsmlToolCli = async (argv: string[]): Promise<number> => {
  const [mode, ...rest] = argv;
  if (isHelp(mode)) {
    process.stdout.write(SSML_TOOL_USAGE);
    return 0;
  }
  const handler = mode !== undefined && Object.hasOwn(modes, mode) ? modes[mode] : undefined;
  if (!handler) {
    process.stderr.write(`ssml-tool: unknown mode "${mode}"\n\n${SSML_TOOL_USAGE}`);
    return 1;
  }
  return handler(rest);
};

// Symlinked bins (npm link, node_modules/.bin) resolve to this file.
const invokedDirectly = (): boolean => {
  const script = process.argv[1];
  if (!script || !fs.existsSync(script)) {
    return false;
  }
  return fs.realpathSync(script) === fs.realpathSync(fileURLToPath(import.meta.url));
};

/* v8 ignore next 9 */
if (invokedDirectly()) {
  runSsmlToolCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`ssml-tool: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    }
  );
}

import fs from "node:fs";
import path from "node:path";

import { createSsmlProcessor, DEFAULT_CACHE_SIZE } from "../../api.js";
import { isSsmlError } from "../../core/errors.js";
import { parseSsml } from "../../markup/parser.js";
import { renderSsml } from "../../markup/serializer.js";
import { countNodes, extractSpeechText } from "../../markup/transform.js";
import { checkWellFormedXml } from "../../markup/well-formed.js";
import { hasErrorCode, makeCliError } from "../core/cli-error.js";
import { readSsmlDir, readSsmlFile } from "../core/source-loader.js";

type WriteLine = (line: string) => void;

const parseFlags = (args: string[]): Record<string, string> => {
  const flags: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("--")) {
      throw makeCliError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
    }
    const name = token.slice(2);
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw makeCliError("CLI_ARG_MISSING", `Missing value for --${name}`);
    }
    flags[name] = value;
    i += 1;
  }
  return flags;
};

const getRequiredFlag = (flags: Record<string, string>, name: string): string => {
  const value = flags[name];
  if (value === undefined) {
    throw makeCliError("CLI_ARG_REQUIRED", `Missing required argument --${name}`);
  }
  return value;
};

const parseCacheSize = (flags: Record<string, string>): number => {
  const raw = flags["cache-size"];
  if (raw === undefined) {
    return DEFAULT_CACHE_SIZE;
  }
  const size = Number.parseInt(raw, 10);
  if (Number.isNaN(size) || size < 1) {
    throw makeCliError("CLI_CACHE_SIZE_PARSE", `Invalid cache size: ${raw}`);
  }
  return size;
};

const emitError = (writeLine: WriteLine, error: unknown): number => {
  const code = isSsmlError(error)
    ? error.code
    : hasErrorCode(error)
      ? String(error.code)
      : "CLI_ERROR";
  const message = error instanceof Error ? error.message : "Unknown CLI error.";

  writeLine("RESULT:ERROR");
  writeLine(`ERROR_CODE:${code}`);
  writeLine(`ERROR_MSG_JSON:${JSON.stringify(message)}`);
  if (isSsmlError(error) && error.span) {
    writeLine(`ERROR_AT:${error.span.start.line}:${error.span.start.column}`);
  }
  return 1;
};

const checkFile = (file: string, writeLine: WriteLine): number => {
  const document = readSsmlFile(file);
  const root = parseSsml(document.markup);
  const counts = countNodes(root);
  const report = checkWellFormedXml(renderSsml(root));

  writeLine("RESULT:OK");
  writeLine(`ROOT:${root.name}`);
  writeLine(`TAGS:${counts.tags}`);
  writeLine(`TEXTS:${counts.texts}`);
  writeLine(`WELL_FORMED:${report.wellFormed}`);
  return 0;
};

const checkDir = (dir: string, cacheSize: number, writeLine: WriteLine): number => {
  const documents = readSsmlDir(dir);
  const processor = createSsmlProcessor({ cacheSize });
  let failed = 0;
  const lines = documents.map((document) => {
    try {
      processor.parse(document.markup);
      return `DOCUMENT:${document.path}|OK`;
    } catch (error) {
      if (!isSsmlError(error)) {
        throw error;
      }
      failed += 1;
      return `DOCUMENT:${document.path}|ERROR|${error.code}`;
    }
  });

  writeLine(failed === 0 ? "RESULT:OK" : "RESULT:ERROR");
  for (const line of lines) {
    writeLine(line);
  }
  writeLine(`CHECKED:${documents.length}`);
  writeLine(`FAILED:${failed}`);
  writeLine(`CACHE_HITS:${processor.stats().hits}`);
  return failed === 0 ? 0 : 1;
};

const runCheck = (args: string[], writeLine: WriteLine): number => {
  const flags = parseFlags(args);
  const file = flags.file ?? "";
  const dir = flags.dir ?? "";
  if ((file && dir) || (!file && !dir)) {
    throw makeCliError(
      "CLI_SOURCE_REQUIRED",
      "Use exactly one source selector: --file <path> or --dir <path>."
    );
  }
  if (file) {
    if (flags["cache-size"] !== undefined) {
      throw makeCliError("CLI_ARG_CONFLICT", "--cache-size only applies to --dir checks.");
    }
    return checkFile(file, writeLine);
  }
  return checkDir(dir, parseCacheSize(flags), writeLine);
};

const runFormat = (args: string[], writeLine: WriteLine): number => {
  const flags = parseFlags(args);
  const document = readSsmlFile(getRequiredFlag(flags, "file"));
  const canonical = renderSsml(parseSsml(document.markup));

  const out = flags.out;
  writeLine("RESULT:OK");
  if (out === undefined) {
    writeLine(`MARKUP_JSON:${JSON.stringify(canonical)}`);
    return 0;
  }
  const resolved = path.resolve(out);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, canonical, "utf8");
  writeLine(`OUT:${resolved}`);
  return 0;
};

const runText = (args: string[], writeLine: WriteLine): number => {
  const flags = parseFlags(args);
  const document = readSsmlFile(getRequiredFlag(flags, "file"));
  const root = parseSsml(document.markup);

  writeLine("RESULT:OK");
  writeLine(`TEXT_JSON:${JSON.stringify(extractSpeechText(root))}`);
  return 0;
};

export const runAgentCommand = (
  argv: string[],
  writeLine: WriteLine = (line) => {
    process.stdout.write(`${line}\n`);
  }
): number => {
  try {
    const [subcommand, ...rest] = argv;
    if (!subcommand) {
      throw makeCliError("CLI_AGENT_USAGE", "Missing agent subcommand. Use check/format/text.");
    }
    if (subcommand === "check") {
      return runCheck(rest, writeLine);
    }
    if (subcommand === "format") {
      return runFormat(rest, writeLine);
    }
    if (subcommand === "text") {
      return runText(rest, writeLine);
    }
    throw makeCliError(
      "CLI_AGENT_USAGE",
      `Unknown agent subcommand: ${subcommand}. Use check/format/text.`
    );
  } catch (error) {
    return emitError(writeLine, error);
  }
};

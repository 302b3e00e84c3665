import { useEffect } from "react";
import { Box, Text, render, useApp } from "ink";

import { isSsmlError } from "../../core/errors.js";
import type { SsmlNode, SsmlTagNode } from "../../core/types.js";
import { parseSsml } from "../../markup/parser.js";
import { readSsmlFile } from "../core/source-loader.js";

const TEXT_PREVIEW_WIDTH = 60;
const ELLIPSIS = "…";

export interface TreeOptions {
  file: string;
  maxDepth: number | null;
}

export interface TreeRow {
  key: string;
  depth: number;
  kind: "tag" | "text" | "hidden";
  label: string;
  detail: string;
}

const truncateToWidth = (value: string, width: number): string => {
  if (value.length <= width) {
    return value;
  }
  return `${value.slice(0, width - 1)}${ELLIPSIS}`;
};

export const parseTreeArgs = (argv: string[]): TreeOptions => {
  let file: string | null = null;
  let maxDepth: number | null = null;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const value = argv[i + 1];
    if (token === "--file") {
      file = value ?? "";
      i += 1;
      continue;
    }
    if (token === "--max-depth") {
      const depth = Number.parseInt(value ?? "", 10);
      if (Number.isNaN(depth) || depth < 0) {
        throw new Error(`Invalid --max-depth: ${value ?? ""}`);
      }
      maxDepth = depth;
      i += 1;
      continue;
    }
    throw new Error(`Unknown argument for tree mode: ${token}`);
  }

  if (!file) {
    throw new Error("Missing source. Use --file <path>.");
  }
  return { file, maxDepth };
};

const describeAttributes = (tag: SsmlTagNode): string => {
  return [...tag.attributes].map(([key, value]) => `${key}="${value}"`).join(" ");
};

/** Flattens a tree into indented rows; tags at `maxDepth` hide their children. */
export const buildTreeRows = (root: SsmlTagNode, maxDepth: number | null = null): TreeRow[] => {
  const rows: TreeRow[] = [];
  const walk = (node: SsmlNode, depth: number): void => {
    const key = `row-${rows.length}`;
    if (node.kind === "text") {
      rows.push({
        key,
        depth,
        kind: "text",
        label: truncateToWidth(JSON.stringify(node.value), TEXT_PREVIEW_WIDTH),
        detail: "",
      });
      return;
    }
    rows.push({ key, depth, kind: "tag", label: node.name, detail: describeAttributes(node) });
    if (node.children.length === 0) {
      return;
    }
    if (maxDepth !== null && depth >= maxDepth) {
      rows.push({
        key: `row-${rows.length}`,
        depth: depth + 1,
        kind: "hidden",
        label: `${ELLIPSIS} ${node.children.length} hidden`,
        detail: "",
      });
      return;
    }
    for (const child of node.children) {
      walk(child, depth + 1);
    }
  };
  walk(root, 0);
  return rows;
};

const TreeApp = ({ rows }: { rows: TreeRow[] }) => {
  const { exit } = useApp();

  useEffect(() => {
    exit();
  }, [exit]);

  return (
    <Box flexDirection="column">
      {rows.map((row) => (
        <Text key={row.key}>
          {"  ".repeat(row.depth)}
          {row.kind === "tag" && <Text color="cyan">{`<${row.label}>`}</Text>}
          {row.kind === "text" && <Text>{row.label}</Text>}
          {row.kind === "hidden" && <Text color="gray">{row.label}</Text>}
          {row.detail.length > 0 && <Text color="gray">{` ${row.detail}`}</Text>}
        </Text>
      ))}
    </Box>
  );
};

export const runTreeCommand = async (argv: string[]): Promise<number> => {
  try {
    const options = parseTreeArgs(argv);
    const document = readSsmlFile(options.file);
    const rows = buildTreeRows(parseSsml(document.markup), options.maxDepth);
    const app = render(<TreeApp rows={rows} />);
    await app.waitUntilExit();
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown tree error.";
    const prefix = isSsmlError(error) ? `${error.code}: ` : "";
    process.stderr.write(`${prefix}${message}\n`);
    return 1;
  }
};

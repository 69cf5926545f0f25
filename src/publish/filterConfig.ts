import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { cfg } from "../config.js";
import { logger } from "../logger.js";
import { PreconditionError } from "./errors.js";

export const FilterSpecSchema = z.object({
  excludePaths: z.array(z.string().min(1)),
  excludeGlobs: z.array(z.string().min(1)),
});
export type FilterSpec = z.infer<typeof FilterSpecSchema>;

export const PublishConfigSchema = z
  .object({
    privateRemote: z.string({ required_error: "private_remote not set" }).min(1, "private_remote not set"),
    publicRemote: z.string({ required_error: "public_remote not set" }).min(1, "public_remote not set"),
    branch: z.string().min(1),
    filter: FilterSpecSchema,
    messageTemplate: z.string().min(1).optional(),
  })
  .refine((c) => c.privateRemote !== c.publicRemote, {
    message: "private_remote and public_remote must name different remotes",
    path: ["publicRemote"],
  });
export type PublishConfig = z.infer<typeof PublishConfigSchema>;

export type ParsedPublishConfig = {
  config: PublishConfig;
  warnings: string[];
};

function unquote(value: string) {
  if (
    value.length >= 2 &&
    ((value.startsWith("'") && value.endsWith("'")) || (value.startsWith('"') && value.endsWith('"')))
  ) {
    return value.slice(1, -1);
  }
  return value;
}

/** Normalizes a literal exclusion to a repository-relative path without trailing slash. */
export function normalizeExcludePath(raw: string) {
  return raw.replace(/\\/g, "/").replace(/^\.\/+/, "").replace(/^\/+/, "").replace(/\/+$/, "");
}

type ConfigLine = { lineNo: number; key: string | null; value: string };

/** Non-blank, non-comment lines; `key` is null for a line without `=`. */
function* configLines(text: string): Generator<ConfigLine> {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const trimmed = (lines[i] ?? "").trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) {
      yield { lineNo: i + 1, key: null, value: trimmed };
      continue;
    }
    yield { lineNo: i + 1, key: trimmed.slice(0, eq).trim(), value: unquote(trimmed.slice(eq + 1).trim()) };
  }
}

/**
 * Only the `private_remote` setting, without validating the rest of the
 * file. Null when it is absent or empty.
 */
export function readPrivateRemote(text: string): string | null {
  let remote: string | null = null;
  for (const line of configLines(text)) {
    if (line.key === "private_remote") remote = line.value || null;
  }
  return remote;
}

/**
 * Parses the plain `key=value` publish config. Later `branch` or remote
 * lines win; `exclude` and `exclude_glob` accumulate in file order.
 */
export function parsePublishConfig(text: string): ParsedPublishConfig {
  const warnings: string[] = [];
  const raw: {
    privateRemote?: string;
    publicRemote?: string;
    branch: string;
    messageTemplate?: string;
    filter: FilterSpec;
  } = {
    branch: cfg.publish.defaultBranch,
    filter: { excludePaths: [], excludeGlobs: [] },
  };

  for (const line of configLines(text)) {
    if (line.key === null) {
      warnings.push(`line ${line.lineNo}: ignoring '${line.value}' (expected key=value)`);
      continue;
    }
    const { key, value, lineNo } = line;
    switch (key) {
      case "private_remote":
        raw.privateRemote = value;
        break;
      case "public_remote":
        raw.publicRemote = value;
        break;
      case "branch":
        raw.branch = value;
        break;
      case "exclude": {
        const p = normalizeExcludePath(value);
        if (p) raw.filter.excludePaths.push(p);
        else warnings.push(`line ${lineNo}: empty exclude ignored`);
        break;
      }
      case "exclude_glob":
        if (value) raw.filter.excludeGlobs.push(value);
        else warnings.push(`line ${lineNo}: empty exclude_glob ignored`);
        break;
      case "message_template":
        raw.messageTemplate = value || undefined;
        break;
      default:
        warnings.push(`line ${lineNo}: unknown config key '${key}'`);
    }
  }

  const parsed = PublishConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const reasons = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new PreconditionError(`Invalid publish config: ${reasons}`);
  }
  return { config: parsed.data, warnings };
}

export async function loadPublishConfig(repoRoot: string, configPath?: string): Promise<ParsedPublishConfig> {
  const file = path.resolve(repoRoot, configPath || cfg.publish.configFile);
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (error) {
    throw new PreconditionError(`No ${path.basename(file)} found in ${path.dirname(file)}`, {
      cause: error,
      hint: [
        "Create one with:",
        "  private_remote=<name>    # remote for full content (e.g., 'private')",
        "  public_remote=<name>     # remote for filtered content (e.g., 'origin')",
        "  branch=<name>            # branch to push (default: main)",
        "  exclude=<path>           # one per line, paths to exclude from public",
        "  exclude_glob=<pattern>   # one per line; '*' stops at '/', '**' crosses it",
      ].join("\n"),
    });
  }

  const result = parsePublishConfig(text);
  for (const warning of result.warnings) {
    logger.warn(`publish config: ${warning}`, { file });
  }
  return result;
}

export function isEmptyFilter(filter: FilterSpec) {
  return filter.excludePaths.length === 0 && filter.excludeGlobs.length === 0;
}

/**
 * Document loader - reads a JSON or YAML file into a generic value tree
 */

import { readFile, stat } from "fs/promises";
import { extname } from "path";
import { parse as parseYaml } from "yaml";
import type { DocumentValue, ValidationIssue } from "../../types/data-model.js";
import { getErrorCode } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { DocumentFormat, LoadFailure, LoadResult } from "./types.js";

export type { DocumentFormat, LoadedDocument, LoadFailure, LoadResult } from "./types.js";

const TIMESTAMP_TAG = "tag:yaml.org,2002:timestamp";

const FORMAT_BY_SUFFIX: Record<string, DocumentFormat> = {
  ".json": "json",
  ".yml": "yaml",
  ".yaml": "yaml",
};

export function detectFormat(filePath: string): DocumentFormat | undefined {
  return FORMAT_BY_SUFFIX[extname(filePath).toLowerCase()];
}

function loadFailure(filePath: string, issue: Omit<ValidationIssue, "location" | "detail">): LoadFailure {
  return {
    ok: false,
    filePath,
    issue: { ...issue, location: "$", detail: null },
  };
}

/**
 * Parse document text in the given format
 *
 * @throws SyntaxError or YAMLParseError when the text is malformed
 */
export function parseDocument(content: string, format: DocumentFormat): DocumentValue {
  if (format === "json") {
    return JSON.parse(content);
  }
  // YAML 1.1 scalars (yes/no/on/off booleans) with dates kept as strings;
  // duplicate keys are errors
  return parseYaml(content, {
    schema: "yaml-1.1",
    customTags: (tags) =>
      tags.filter((tag) => typeof tag === "string" || tag.tag !== TIMESTAMP_TAG),
    uniqueKeys: true,
  });
}

/**
 * Load a document from disk
 *
 * Never throws: every failure is reported as a single issue located at `$`.
 */
export async function loadDocument(filePath: string): Promise<LoadResult> {
  try {
    await stat(filePath);
  } catch (error) {
    logger.debug("Document not found", { filePath, code: getErrorCode(error) });
    return loadFailure(filePath, {
      kind: "not_found",
      message: `'${filePath}' not found`,
    });
  }

  const format = detectFormat(filePath);
  if (!format) {
    return loadFailure(filePath, {
      kind: "unsupported_format",
      message: `'${filePath}' of type '${extname(filePath)}' not supported`,
    });
  }

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    logger.debug("Failed to read document", { filePath, code: getErrorCode(error) });
    return loadFailure(filePath, {
      kind: "parse_error",
      message: "error reading file",
    });
  }

  try {
    const document = parseDocument(content, format);
    logger.debug("Document loaded", { filePath, format });
    return { ok: true, filePath, format, document, content };
  } catch (error) {
    logger.debug("Failed to parse document", {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return loadFailure(filePath, {
      kind: "parse_error",
      message: "error parsing file",
    });
  }
}

/**
 * Loader module types
 */

import type { DocumentValue, ValidationIssue } from "../../types/data-model.js";

export type DocumentFormat = "json" | "yaml";

export interface LoadedDocument {
  ok: true;
  filePath: string;
  format: DocumentFormat;
  document: DocumentValue;
  /** Raw file text, used for content hashing */
  content: string;
}

export interface LoadFailure {
  ok: false;
  filePath: string;
  issue: ValidationIssue;
}

export type LoadResult = LoadedDocument | LoadFailure;

/**
 * Run summary counters
 */

import type { SummaryRecord } from "./types.js";

export class Summary {
  private validated = 0;
  private valid = 0;
  private invalidFiles: string[] = [];

  addRecord(valid: boolean, filePath: string): void {
    this.validated++;
    if (valid) {
      this.valid++;
    } else {
      this.invalidFiles.push(filePath);
    }
  }

  get validatedFileCount(): number {
    return this.validated;
  }

  get validFileCount(): number {
    return this.valid;
  }

  get invalidFileCount(): number {
    return this.invalidFiles.length;
  }

  get errorFiles(): readonly string[] {
    return this.invalidFiles;
  }

  toJSON(): SummaryRecord {
    return {
      validated_file_count: this.validated,
      valid_file_count: this.valid,
      invalid_file_count: this.invalidFiles.length,
      error_files: [...this.invalidFiles],
    };
  }
}

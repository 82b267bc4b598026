/**
 * Error categories raised by module analysis
 */

import type { UnanalyzedCode } from './types/index.js';

export type ErrorCategory = 'config' | 'file';

/**
 * Invalid configuration or selector input (bad budget, negative sizes, broken config file).
 * Always thrown; never recorded per file.
 */
export class AnalysisConfigError extends Error {
  readonly category: ErrorCategory = 'config';

  constructor(message: string) {
    super(message);
    this.name = 'AnalysisConfigError';
  }
}

/**
 * A single file could not be analyzed. The analyzer records these instead of aborting the scan.
 */
export class FileAnalysisError extends Error {
  readonly category: ErrorCategory = 'file';

  constructor(
    readonly filePath: string,
    readonly code: UnanalyzedCode,
    message: string
  ) {
    super(message);
    this.name = 'FileAnalysisError';
  }
}

/**
 * Structured JSON output for CLI commands.
 *
 * Every `--json` payload carries the CLI version and a `success` flag so
 * scripts can branch without parsing human-readable text.
 */

import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * Build a JSON error payload.
   *
   * @param options - Extra fields (exit code, suggestion, ...)
   */
  static buildJsonError(
    error: string | Error,
    options?: { exitCode?: number; [key: string]: unknown }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }

  static buildJsonSuccess(data: Record<string, unknown>): Record<string, unknown> {
    return {
      version: VERSION,
      success: true,
      ...data,
    };
  }
}

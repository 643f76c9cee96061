/**
 * JSONL Protocol Handler
 *
 * Utilities for newline-delimited JSON streams.
 */

/**
 * JSONL buffer for accumulating partial frames.
 */
export class JSONLBuffer {
  private buffer = '';

  /**
   * Append a chunk and return every complete, non-blank line.
   */
  process(chunk: string): string[] {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.filter((line) => line.trim());
  }

  clear(): void {
    this.buffer = '';
  }

  getBuffer(): string {
    return this.buffer;
  }
}

/**
 * Decode one JSONL frame. The result still needs validating.
 *
 * @throws SyntaxError for malformed JSON
 */
export function parseJSONLFrame(line: string): unknown {
  return JSON.parse(line);
}

/**
 * Serialize object to JSONL frame (JSON + newline).
 */
export function toJSONLFrame(obj: unknown): string {
  return JSON.stringify(obj) + '\n';
}

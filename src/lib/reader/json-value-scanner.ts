/**
 * Incremental splitter for a stream of concatenated JSON values
 *
 * Values may be separated by any whitespace and may span lines or chunk
 * boundaries. Only the value currently being read is buffered.
 */

import { InputReadError } from "../../utils/errors.js";

export interface ScannedValue {
  text: string;
  line: number; // line the value starts on, 1-based
}

type ScanMode = "idle" | "container" | "string" | "bare";

function isWhitespace(c: string): boolean {
  return c === " " || c === "\n" || c === "\t" || c === "\r";
}

export class JsonValueScanner {
  private mode: ScanMode = "idle";
  private depth = 0;
  private inString = false;
  private escaped = false;
  private pieces: string[] = [];
  private line = 1;
  private startLine = 1;

  constructor(private readonly source: string) {}

  /**
   * Feed the next chunk; returns the values it completed
   */
  push(chunk: string): ScannedValue[] {
    const values: ScannedValue[] = [];
    let start = this.mode === "idle" ? -1 : 0;

    for (let i = 0; i < chunk.length; i++) {
      const c = chunk[i];

      switch (this.mode) {
        case "idle":
          if (c === "\n") this.line++;
          if (isWhitespace(c)) continue;
          start = i;
          this.startLine = this.line;
          if (c === "{" || c === "[") {
            this.mode = "container";
            this.depth = 1;
          } else if (c === '"') {
            this.mode = "string";
          } else {
            this.mode = "bare";
          }
          break;

        case "bare":
          // Literals and numbers end at whitespace or the next value
          if (isWhitespace(c) || c === "{" || c === "[" || c === '"') {
            values.push(this.finish(chunk.slice(start, i)));
            i--;
          }
          break;

        case "string":
          if (c === "\n") this.line++;
          if (this.escaped) {
            this.escaped = false;
          } else if (c === "\\") {
            this.escaped = true;
          } else if (c === '"') {
            values.push(this.finish(chunk.slice(start, i + 1)));
          }
          break;

        case "container":
          if (c === "\n") this.line++;
          if (this.inString) {
            if (this.escaped) {
              this.escaped = false;
            } else if (c === "\\") {
              this.escaped = true;
            } else if (c === '"') {
              this.inString = false;
            }
          } else if (c === '"') {
            this.inString = true;
          } else if (c === "{" || c === "[") {
            this.depth++;
          } else if (c === "}" || c === "]") {
            this.depth--;
            if (this.depth === 0) {
              values.push(this.finish(chunk.slice(start, i + 1)));
            }
          }
          break;
      }
    }

    if (this.mode !== "idle") {
      this.pieces.push(chunk.slice(start));
    }
    return values;
  }

  /**
   * Signal end of input; returns a trailing bare value if any
   */
  end(): ScannedValue[] {
    if (this.mode === "idle") return [];
    if (this.mode === "bare") return [this.finish("")];

    throw new InputReadError(
      `Unexpected end of input in JSON value starting on line ${this.startLine} of ${this.source}`,
      { file: this.source, line: this.startLine },
    );
  }

  private finish(tail: string): ScannedValue {
    const text = this.pieces.join("") + tail;
    this.pieces = [];
    this.mode = "idle";
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
    return { text, line: this.startLine };
  }
}

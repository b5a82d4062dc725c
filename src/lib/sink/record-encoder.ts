/**
 * Record encoder - object-mode Transform that turns output records into
 * NDJSON lines or one JSON array
 */

import { Transform, type TransformCallback } from "stream";
import type { OutputFormat } from "../../types/config.js";
import { isPlainObject } from "../../types/records.js";

interface Framing {
  open: string;
  first: string; // before the first record
  between: string; // before every later record
  after: string;
  close: (empty: boolean) => string;
}

const FRAMINGS: Record<OutputFormat, Framing> = {
  ndjson: { open: "", first: "", between: "", after: "\n", close: () => "" },
  json: {
    open: "[\n",
    first: "  ",
    between: ",\n  ",
    after: "",
    close: (empty) => (empty ? "]\n" : "\n]\n"),
  },
};

export class RecordEncoder extends Transform {
  private readonly framing: Framing;
  private encoded = 0;

  constructor(readonly format: OutputFormat = "ndjson") {
    super({
      writableObjectMode: true, // Input is records
      readableObjectMode: false, // Output is text
    });
    this.framing = FRAMINGS[format];
  }

  get count(): number {
    return this.encoded;
  }

  _construct(callback: (error?: Error | null) => void): void {
    if (this.framing.open !== "") this.push(this.framing.open);
    callback();
  }

  _transform(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    if (!isPlainObject(chunk)) {
      callback(new TypeError("Record encoder only accepts plain records"));
      return;
    }

    try {
      const lead = this.encoded === 0 ? this.framing.first : this.framing.between;
      this.push(lead + JSON.stringify(chunk) + this.framing.after);
      this.encoded++;
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }

  _flush(callback: TransformCallback): void {
    const close = this.framing.close(this.encoded === 0);
    if (close !== "") this.push(close);
    callback();
  }
}

export function createRecordEncoder(format: OutputFormat = "ndjson"): RecordEncoder {
  return new RecordEncoder(format);
}

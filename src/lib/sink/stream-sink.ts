/**
 * Stream sink - writes records as NDJSON or a JSON array to a file or
 * stdout
 */

import { createWriteStream } from "fs";
import { once } from "events";
import type { Writable } from "stream";
import { pipeline } from "stream/promises";
import type { OutputFormat } from "../../types/config.js";
import type { OutputRecord } from "../../types/records.js";
import { SinkError, errorMessage } from "../../utils/errors.js";
import { RecordEncoder, createRecordEncoder } from "./record-encoder.js";
import type { EventSink, SinkMetrics } from "./types.js";

export class StreamEventSink implements EventSink {
  private readonly writer: RecordEncoder;
  private readonly finished: Promise<void>;
  private failure: unknown;

  constructor(
    destination: Writable,
    format: OutputFormat = "ndjson",
    private readonly destinationName = "stream",
    endDestination = true,
  ) {
    this.writer = createRecordEncoder(format);
    this.finished = pipeline(this.writer, destination, {
      end: endDestination,
    }).catch((error: unknown) => {
      this.failure = error;
    });
  }

  async write(record: OutputRecord): Promise<void> {
    this.throwIfFailed();
    if (!this.writer.write(record)) {
      await Promise.race([once(this.writer, "drain"), this.finished]);
      this.throwIfFailed();
    }
  }

  async close(): Promise<SinkMetrics> {
    this.writer.end();
    await this.finished;
    this.throwIfFailed();
    return {
      destination: this.destinationName,
      written: this.writer.count,
      failed: 0,
    };
  }

  private throwIfFailed(): void {
    if (this.failure !== undefined) {
      throw new SinkError(
        `Failed writing records to ${this.destinationName}: ${errorMessage(this.failure)}`,
        { destination: this.destinationName },
        { cause: this.failure },
      );
    }
  }
}

/**
 * Sink for an output path, or stdout when the path is 'stdout'
 */
export function createStreamSink(
  path: string,
  format: OutputFormat = "ndjson",
): StreamEventSink {
  if (path === "stdout") {
    // stdout stays open for the run summary
    return new StreamEventSink(process.stdout, format, path, false);
  }
  return new StreamEventSink(createWriteStream(path), format, path);
}

/**
 * Sink module types
 */

import type { OutputRecord } from "../../types/records.js";

export interface SinkMetrics {
  destination: string;
  written: number;
  failed: number;
}

/**
 * Destination for validated records, fed in translation order
 */
export interface EventSink {
  write(record: OutputRecord): Promise<void>;
  close(): Promise<SinkMetrics>;
}

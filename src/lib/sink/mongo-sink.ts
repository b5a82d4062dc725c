import {
  MongoBulkWriteError,
  MongoClient,
  type Collection,
  type W,
} from "mongodb";
import type { OutputRecord } from "../../types/records.js";
import { DEFAULT_BATCH_SIZE } from "../../types/config.js";
import { ConfigError, SinkError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { EventSink, SinkMetrics } from "./types.js";

const log = logger.child("event-store");

/**
 * Event store connection settings. The import's table name is the
 * target collection.
 */
export interface MongoSinkConfig {
  uri: string;
  database: string;
  collection: string;
  batchSize?: number;
  writeConcern?: string;
}

function parseWriteConcern(value: string): W {
  if (/^\d+$/.test(value)) return Number.parseInt(value, 10);
  if (value === "majority") return value;
  throw new ConfigError(`Unsupported write concern: ${value}`, {
    writeConcern: value,
  });
}

/**
 * MongoDB event sink
 * Buffers records and writes them with ordered bulk inserts so the
 * store sees them in translation order
 */
export class MongoEventSink implements EventSink {
  private readonly client: MongoClient;
  private readonly config: Required<MongoSinkConfig>;
  private collection?: Collection;
  private batch: OutputRecord[] = [];
  private written = 0;
  private failed = 0;

  constructor(config: MongoSinkConfig) {
    this.config = {
      ...config,
      batchSize: config.batchSize ?? DEFAULT_BATCH_SIZE,
      writeConcern: config.writeConcern ?? "majority",
    };

    this.client = new MongoClient(this.config.uri, {
      writeConcern: { w: parseWriteConcern(this.config.writeConcern) },
      serverSelectionTimeoutMS: 10000,
      socketTimeoutMS: 60000,
    });
  }

  get destination(): string {
    return `${this.config.database}/${this.config.collection}`;
  }

  /**
   * Connect to MongoDB and prepare the target collection
   */
  async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.collection = this.client
        .db(this.config.database)
        .collection(this.config.collection);
      log.info(`Connected to event store collection: ${this.destination}`);
    } catch (error) {
      log.error("MongoDB connection failed", errorMessage(error));
      throw new SinkError(
        `Failed to connect to MongoDB: ${errorMessage(error)}`,
        { destination: this.destination },
        { cause: error },
      );
    }
  }

  async write(record: OutputRecord): Promise<void> {
    this.batch.push(record);
    if (this.batch.length >= this.config.batchSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.batch.length === 0) return;
    if (!this.collection) {
      throw new SinkError("Event store sink used before connect()", {
        destination: this.destination,
      });
    }

    const batch = this.batch;
    this.batch = [];

    try {
      const result = await this.collection.insertMany(batch, { ordered: true });
      this.written += result.insertedCount;
    } catch (error) {
      if (!(error instanceof MongoBulkWriteError)) {
        throw new SinkError(
          `Bulk insert failed: ${errorMessage(error)}`,
          { destination: this.destination },
          { cause: error },
        );
      }
      // Ordered inserts stop at the first failing document
      log.error("Bulk insert failed", errorMessage(error));
      this.written += error.insertedCount;
      this.failed += batch.length - error.insertedCount;
    }
  }

  async close(): Promise<SinkMetrics> {
    try {
      await this.flush();
    } finally {
      await this.client.close();
    }
    return {
      destination: this.destination,
      written: this.written,
      failed: this.failed,
    };
  }
}

/**
 * Factory function for connected MongoEventSink instances
 */
export async function createMongoSink(
  config: MongoSinkConfig,
): Promise<MongoEventSink> {
  const sink = new MongoEventSink(config);
  await sink.connect();
  return sink;
}

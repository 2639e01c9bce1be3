import fs from "node:fs";
import { ParquetReader, ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import { parseFetchTime, parseNonNegativeInteger } from "../filter/indexRecord";
import { ExtractRecord, PartInfo } from "../types";
import { PartWriter } from "./types";

export const EXTRACT_SCHEMA = new ParquetSchema({
  url: { type: "UTF8" },
  warc_filename: { type: "UTF8" },
  warc_record_offset: { type: "INT64" },
  warc_record_length: { type: "INT64" },
  fetch_time: { type: "TIMESTAMP_MILLIS" },
});

type ParquetRow = {
  url: string;
  warc_filename: string;
  warc_record_offset: number;
  warc_record_length: number;
  fetch_time: Date;
};

function toParquetRow(record: ExtractRecord): ParquetRow {
  return {
    url: record.url,
    warc_filename: record.warc_filename,
    warc_record_offset: record.warc_record_offset,
    warc_record_length: record.warc_record_length,
    fetch_time: record.fetch_time,
  };
}

export class ParquetPartWriter implements PartWriter {
  readonly partitionId: string;
  readonly fileName: string;
  readonly filePath: string;
  private readonly writer: ParquetWriter;
  private rowCount = 0;

  private constructor(partitionId: string, fileName: string, filePath: string, writer: ParquetWriter) {
    this.partitionId = partitionId;
    this.fileName = fileName;
    this.filePath = filePath;
    this.writer = writer;
  }

  static async open(options: {
    partitionId: string;
    fileName: string;
    filePath: string;
    rowGroupSize: number;
  }): Promise<ParquetPartWriter> {
    const writer = await ParquetWriter.openFile(EXTRACT_SCHEMA, options.filePath);
    writer.setRowGroupSize(options.rowGroupSize);
    return new ParquetPartWriter(options.partitionId, options.fileName, options.filePath, writer);
  }

  async append(record: ExtractRecord): Promise<void> {
    await this.writer.appendRow(toParquetRow(record));
    this.rowCount += 1;
  }

  async close(): Promise<PartInfo> {
    await this.writer.close();
    return {
      partitionId: this.partitionId,
      fileName: this.fileName,
      rowCount: this.rowCount,
    };
  }

  async discard(): Promise<void> {
    try {
      await this.writer.close();
    } finally {
      await fs.promises.rm(this.filePath, { force: true });
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readPartFile(filePath: string): Promise<ExtractRecord[]> {
  const reader = await ParquetReader.openFile(filePath);
  const records: ExtractRecord[] = [];
  try {
    const cursor = reader.getCursor();
    while (true) {
      const row: unknown = await cursor.next();
      if (!row) {
        break;
      }
      if (!isRecord(row)) {
        throw new Error(`Unexpected row shape in ${filePath}`);
      }

      const { url, warc_filename } = row;
      const offset = parseNonNegativeInteger(row.warc_record_offset);
      const length = parseNonNegativeInteger(row.warc_record_length);
      const fetchTime = parseFetchTime(row.fetch_time);
      if (
        typeof url !== "string" ||
        typeof warc_filename !== "string" ||
        offset === undefined ||
        length === undefined ||
        !fetchTime
      ) {
        throw new Error(`Row does not match the extract schema in ${filePath}`);
      }

      records.push({
        url,
        warc_filename,
        warc_record_offset: offset,
        warc_record_length: length,
        fetch_time: fetchTime,
      });
    }
  } finally {
    await reader.close();
  }
  return records;
}

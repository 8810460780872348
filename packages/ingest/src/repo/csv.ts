import { appendFileSync, copyFileSync, existsSync, mkdirSync, statSync } from "fs";
import { dirname } from "path";
import { formatCsvHeader, formatCsvRow } from "../lib/records";
import type { FundingRecord } from "../lib/types";
import type { RecordSink } from "./types";

/**
 * Appends rows to the daily CSV and, on close, copies the whole daily file
 * over the latest snapshot. The header is written only into a new or empty file.
 */
export class CsvRecordSink implements RecordSink {
  constructor(
    readonly outfile: string,
    readonly latestFile: string,
  ) {
    mkdirSync(dirname(outfile), { recursive: true });
    if (!existsSync(outfile) || statSync(outfile).size === 0) {
      appendFileSync(outfile, formatCsvHeader(), "utf-8");
    }
  }

  async write(record: FundingRecord) {
    appendFileSync(this.outfile, formatCsvRow(record), "utf-8");
  }

  async close() {
    mkdirSync(dirname(this.latestFile), { recursive: true });
    copyFileSync(this.outfile, this.latestFile);
  }
}

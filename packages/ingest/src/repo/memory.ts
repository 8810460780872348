import type { FundingRecord } from "../lib/types";
import type { RecordSink } from "./types";

export class MemoryRecordSink implements RecordSink {
  records: FundingRecord[] = [];
  closed = false;

  async write(record: FundingRecord) {
    this.records.push({ ...record });
  }

  async close() {
    this.closed = true;
  }
}

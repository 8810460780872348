import type { FundingRecord } from "../lib/types";

/** Destination for kept records. One writer per run. */
export interface RecordSink {
  write(record: FundingRecord): Promise<void>;
  /** Called once after the last write. */
  close(): Promise<void>;
}

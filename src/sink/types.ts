/** Destination of batch output: periodic checkpoints and the final write. */
export interface RecordSink {
  writeCheckpoint(entries: readonly unknown[], processed: number): Promise<void>;
  writeFinal(entries: readonly unknown[]): Promise<void>;
}

import type { RecordSink } from "./types";

export interface SinkSnapshot {
  kind: "checkpoint" | "final";
  processed?: number;
  entries: unknown[];
}

/** Keeps a deep copy of every write; for dry runs and tests. */
export class MemorySink implements RecordSink {
  readonly snapshots: SinkSnapshot[] = [];

  async writeCheckpoint(entries: readonly unknown[], processed: number): Promise<void> {
    this.snapshots.push({ kind: "checkpoint", processed, entries: structuredClone([...entries]) });
  }

  async writeFinal(entries: readonly unknown[]): Promise<void> {
    this.snapshots.push({ kind: "final", entries: structuredClone([...entries]) });
  }

  get checkpoints(): SinkSnapshot[] {
    return this.snapshots.filter((snapshot) => snapshot.kind === "checkpoint");
  }
}

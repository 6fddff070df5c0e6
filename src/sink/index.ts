import { LocalJsonSink } from "./localJsonSink";
import { MemorySink } from "./memorySink";
import type { RecordSink } from "./types";

export type SinkKind = "json_file" | "memory";

export function createSink(kind: SinkKind, outputPath: string): RecordSink {
  switch (kind) {
    case "json_file":
      return new LocalJsonSink(outputPath);
    case "memory":
      return new MemorySink();
  }
}

export * from "./localJsonSink";
export * from "./memorySink";
export * from "./types";

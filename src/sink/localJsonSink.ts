import fs from "node:fs";
import path from "node:path";
import { serializeRecords } from "../store";
import type { RecordSink } from "./types";

/**
 * Writes the whole record array to one JSON file. Each write goes to a `.part`
 * file first and is renamed over the target, so readers never see half a file.
 */
export class LocalJsonSink implements RecordSink {
  readonly outputPath: string;

  constructor(outputPath: string) {
    this.outputPath = path.resolve(outputPath);
  }

  async writeCheckpoint(entries: readonly unknown[], _processed: number): Promise<void> {
    await this.write(entries);
  }

  async writeFinal(entries: readonly unknown[]): Promise<void> {
    await this.write(entries);
  }

  private async write(entries: readonly unknown[]): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.outputPath), { recursive: true });
    const tempPath = `${this.outputPath}.part`;

    try {
      await fs.promises.writeFile(tempPath, serializeRecords(entries), "utf-8");
      await fs.promises.rename(tempPath, this.outputPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }
}

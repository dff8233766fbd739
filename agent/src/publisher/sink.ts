/**
 * Output sinks for published reports. A write replaces the previous
 * content in full; the sink only ever shows the latest snapshot.
 */

import { promises as fs } from "fs";
import * as path from "path";

export interface OutputSink {
  write(content: string): Promise<void>;
}

export class FileSink implements OutputSink {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async write(content: string): Promise<void> {
    await fs.writeFile(this.filePath, content, "utf-8");
  }
}

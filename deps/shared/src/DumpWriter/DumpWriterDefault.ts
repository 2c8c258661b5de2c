import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly outputDir: string = "dist/dumps"
  ) {
    this.logger = logger.extend("dump");
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const safeName = name.replace(/[\\/:*?"<>|]/g, "_");
    const filePath = path.join(
      this.outputDir,
      `${format(new Date(), "yyyyMMdd-HHmmss")}-${safeName}.json`
    );
    await writeFile(filePath, JSON.stringify(data, null, 2));
    this.logger.info({ emoji: "📝", file: filePath })`已輸出報告 ${name}`;
    return filePath;
  }
}

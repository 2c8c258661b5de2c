import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileSystemEntry } from "@/types";

import type { FileSystemScanner, ScanError, ScanOptions } from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<FileSystemEntry[], ScanError>> {
    const isRecursive = options?.recursive ?? true;
    const includeDirectories = options?.includeDirectories ?? false;
    const allowExtsSet = new Set(
      Array.from(options?.allowExts ?? [], (e) =>
        e.startsWith(".") ? e.toLowerCase() : `.${e.toLowerCase()}`
      )
    );

    const entries: FileSystemEntry[] = [];
    const walk = async (dir: string) => {
      const dirents = await readdir(dir, { withFileTypes: true });
      // 排序讓輸出順序不受檔案系統影響
      dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      for (const d of dirents) {
        const fullPath = path.join(dir, d.name);
        if (d.isDirectory()) {
          if (includeDirectories) entries.push({ fullPath, isDirectory: true });
          if (isRecursive) await walk(fullPath);
          continue;
        }
        if (!d.isFile()) continue;
        if (
          allowExtsSet.size > 0 &&
          !allowExtsSet.has(path.extname(d.name).toLowerCase())
        ) {
          continue;
        }
        entries.push({ fullPath, isDirectory: false });
      }
    };

    try {
      await walk(rootPath);
      return ok(entries);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

import os from "node:os";
import path from "node:path";

import type { VideoFile } from "@/types";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** `/a/Movie (2020).mkv` → `Movie (2020)` */
export function fileNameWithoutExtension(filePath: string) {
  return path.parse(filePath).name;
}

/** 檔案所在資料夾的名稱 */
export function containingFolderName(filePath: string) {
  return path.basename(path.dirname(filePath));
}

/** 資料夾沒有副檔名：`/a/Dr. Strangelove` → `Dr. Strangelove` */
export function baseName(filePath: string, isDirectory: boolean) {
  return isDirectory ? path.basename(filePath) : fileNameWithoutExtension(filePath);
}

export function baseNameOf(file: Pick<VideoFile, "path" | "isDirectory">) {
  return baseName(file.path, file.isDirectory);
}

import path from "node:path";

import { type NamingOptions, isVideoFile } from "@/config/NamingOptions";
import type { ExtraType } from "@/types";
import { fileNameWithoutExtension } from "@/utils/helper";

/**
 * 依規則判斷檔案是否為額外內容，第一條命中的規則決定類型。
 * 目錄規則不套用在媒體庫根目錄本身。
 */
export function getExtraType(
  filePath: string,
  options: NamingOptions,
  libraryRoot = ""
): ExtraType | undefined {
  if (!isVideoFile(filePath, options)) return undefined;

  const baseName = fileNameWithoutExtension(filePath).toLowerCase();
  const directory = path.dirname(filePath);
  const directoryName = path.basename(directory).toLowerCase();
  const isLibraryRoot =
    libraryRoot !== "" &&
    path.resolve(directory).toLowerCase() ===
      path.resolve(libraryRoot).toLowerCase();

  for (const rule of options.extraRules) {
    const token = rule.token.toLowerCase();
    switch (rule.type) {
      case "filename":
        if (baseName === token) return rule.extraType;
        break;
      case "suffix":
        if (baseName.endsWith(token)) return rule.extraType;
        break;
      case "regex":
        if (rule.pattern?.test(baseName)) return rule.extraType;
        break;
      case "directoryName":
        if (directoryName === token && !isLibraryRoot) return rule.extraType;
        break;
    }
  }
  return undefined;
}

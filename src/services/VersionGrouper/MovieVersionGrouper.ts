import type { Logger } from "~shared/Logger";

import type { NamingOptions } from "@/config/NamingOptions";
import { tryCleanString } from "@/naming/CleanStringParser";
import type { VideoItem } from "@/types";
import { baseNameOf, containingFolderName } from "@/utils/helper";

import type { VersionGrouper } from "./VersionGrouper";
import { orderVersions } from "./versionOrder";

export type MovieEligibility =
  | { eligible: true; folderName: string }
  | {
      eligible: false;
      reason:
        | "NO_FILES"
        | "FOLDER_NAME_TOO_SHORT"
        | "YEAR_MISMATCH"
        | "STACKED_ITEM"
        | "NAME_MISMATCH";
      path?: string;
    };

function primaryBaseName(item: VideoItem) {
  return baseNameOf(item.files[0]);
}

function haveSameYear(items: readonly VideoItem[]) {
  const firstYear = items[0].year ?? -1;
  return items.every((item) => (item.year ?? -1) === firstYear);
}

/**
 * 電影／MV 的多版本分組，整個資料夾視為一組候選：
 *   Movie (2020)/Movie (2020).mkv
 *   Movie (2020)/Movie (2020) - [1080p].mkv
 *   Movie (2020)/Movie (2020) - Director's Cut.mkv
 *   → 一個 "Movie (2020)"，主檔為與資料夾同名者
 * 任何一個檔案不符合命名就整組放棄，不會產生部分分組。
 */
export class MovieVersionGrouper implements VersionGrouper {
  private readonly namingOptions: NamingOptions;
  private readonly logger: Logger;

  constructor(deps: { namingOptions: NamingOptions; logger: Logger }) {
    this.namingOptions = deps.namingOptions;
    this.logger = deps.logger.extend("MovieVersionGrouper");
  }

  group(items: VideoItem[]): VideoItem[] {
    if (items.length === 0) return items;

    const eligibility = this.checkEligibility(items);
    if (!eligibility.eligible) {
      this.logger.debug({
        event: "skip",
        reason: eligibility.reason,
        path: eligibility.path,
      })`不符合多版本分組條件: ${eligibility.reason}`;
      return items;
    }
    return [this.merge(items, eligibility.folderName)];
  }

  /** 只判斷，不修改任何項目 */
  checkEligibility(items: readonly VideoItem[]): MovieEligibility {
    const firstFile = items.at(0)?.files.at(0);
    if (!firstFile) return { eligible: false, reason: "NO_FILES" };

    const folderName = containingFolderName(firstFile.path);
    if (folderName.length <= 1) {
      return { eligible: false, reason: "FOLDER_NAME_TOO_SHORT" };
    }
    if (!haveSameYear(items)) {
      return { eligible: false, reason: "YEAR_MISMATCH" };
    }
    // 合併後只保留每項的第一個檔案，堆疊不能成為其他版本的一員
    if (items.length > 1) {
      const stacked = items.find((item) => item.files.length !== 1);
      if (stacked) {
        return {
          eligible: false,
          reason: "STACKED_ITEM",
          path: stacked.files.at(0)?.path,
        };
      }
    }
    for (const item of items) {
      if (item.extraType !== undefined) continue;
      if (!this.isVersionOfFolder(folderName, primaryBaseName(item))) {
        return {
          eligible: false,
          reason: "NAME_MISMATCH",
          path: item.files[0].path,
        };
      }
    }
    return { eligible: true, folderName };
  }

  /**
   * 檔名須以資料夾名稱開頭，剩餘部分清除發行標記後須為：
   * 空字串、以 "-" 開頭、或以 [版本] 開頭。
   */
  isVersionOfFolder(folderName: string, baseName: string) {
    if (!baseName.toLowerCase().startsWith(folderName.toLowerCase())) {
      return false;
    }
    const rest = baseName.slice(folderName.length).trim();
    const cleaned =
      tryCleanString(rest, this.namingOptions.cleanStrings)?.trim() ?? rest;
    return (
      cleaned === "" ||
      cleaned.startsWith("-") ||
      this.namingOptions.movieVersion.test(cleaned)
    );
  }

  private merge(items: readonly VideoItem[], folderName: string): VideoItem {
    // 有多個與資料夾同名的檔案時，取最後一個
    const exact = items.findLast(
      (item) =>
        item.extraType === undefined && primaryBaseName(item) === folderName
    );
    const ordered =
      items.length > 1
        ? orderVersions(items, {
            resolution: this.namingOptions.resolution,
            baseName: primaryBaseName,
          })
        : [...items];
    const primary = exact ?? ordered[0];

    const alternates = ordered
      .filter((item) => item !== primary)
      .flatMap((item) => [item.files[0], ...item.alternateVersions]);

    this.logger.debug({
      event: "merged",
      primary: primary.files[0].path,
      alternates: alternates.length,
    })`${folderName} 合併 ${alternates.length} 個替代版本`;

    return {
      ...primary,
      name: folderName,
      alternateVersions: [...primary.alternateVersions, ...alternates],
    };
  }
}

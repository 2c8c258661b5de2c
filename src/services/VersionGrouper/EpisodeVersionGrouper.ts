import type { Logger } from "~shared/Logger";

import type { NamingOptions } from "@/config/NamingOptions";
import type { VideoFile, VideoItem } from "@/types";
import { baseNameOf } from "@/utils/helper";

import type { VersionGrouper } from "./VersionGrouper";
import { orderVersions } from "./versionOrder";

export type EpisodeKey = {
  /** 去掉版本後綴的集數識別，例如 "Show S01E01" */
  baseKey: string;
  versionTag?: string;
};

type EpisodeGroup = {
  baseKey: string;
  name: string;
  year?: number;
  files: VideoFile[];
};

type Slot =
  | { type: "group"; group: EpisodeGroup }
  | { type: "item"; item: VideoItem };

/**
 * `Show S01E01 - [HEVC]` → { baseKey: "Show S01E01", versionTag: "HEVC" }
 * `Show S01E01 - 720p`   → { baseKey: "Show S01E01", versionTag: "720p" }
 * `Show - S01E01`        → 結尾的集數代碼不視為版本
 */
export function getEpisodeKey(baseName: string, pattern: RegExp): EpisodeKey {
  const groups = pattern.exec(baseName)?.groups;
  if (groups?.base === undefined) return { baseKey: baseName };
  return {
    baseKey: groups.base,
    versionTag: groups.bracketVersion ?? groups.version,
  };
}

/**
 * 影集的多版本分組：以集數識別（不分大小寫）分組，每組獨立決定主檔，
 * 沒有版本後綴的檔案自成一組，不會影響其他組。
 */
export class EpisodeVersionGrouper implements VersionGrouper {
  private readonly namingOptions: NamingOptions;
  private readonly logger: Logger;

  constructor(deps: { namingOptions: NamingOptions; logger: Logger }) {
    this.namingOptions = deps.namingOptions;
    this.logger = deps.logger.extend("EpisodeVersionGrouper");
  }

  group(items: VideoItem[]): VideoItem[] {
    if (items.length < 2) return items;

    const slots: Slot[] = [];
    const groups = new Map<string, EpisodeGroup>();

    for (const item of items) {
      // 多片段堆疊維持原樣
      if (item.files.length !== 1) {
        slots.push({ type: "item", item });
        continue;
      }
      const file = item.files[0];
      const { baseKey, versionTag } = getEpisodeKey(
        baseNameOf(file),
        this.namingOptions.episodeVersion
      );
      const key = baseKey.toLowerCase();

      let group = groups.get(key);
      if (!group) {
        group = { baseKey, name: item.name, year: item.year, files: [] };
        groups.set(key, group);
        slots.push({ type: "group", group });
      }
      group.files.push(
        versionTag === undefined ? file : { ...file, versionTag },
        ...item.alternateVersions
      );
    }

    return slots.map((slot) =>
      slot.type === "item" ? slot.item : this.buildEpisode(slot.group)
    );
  }

  private buildEpisode(group: EpisodeGroup): VideoItem {
    if (group.files.length > 2) {
      this.logger.warn({
        event: "too-many-versions",
        episode: group.baseKey,
        count: group.files.length,
      })`集數 ${group.baseKey} 找到超過兩個版本，可能是不支援的命名方式`;
    }

    const ordered = orderVersions(group.files, {
      resolution: this.namingOptions.resolution,
      baseName: baseNameOf,
      bucketText: (f) => f.versionTag ?? f.name,
    });
    const baseKey = group.baseKey.toLowerCase();
    const primary =
      ordered.find(
        (f) => baseNameOf(f).toLowerCase() === baseKey
      ) ?? ordered[0];

    return {
      name: group.name,
      year: group.year,
      files: [primary],
      alternateVersions: ordered.filter((f) => f !== primary),
    };
  }
}

import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig, parseMediaKind, readFlag } from "@/config/AppConfig";
import {
  type NamingOptions,
  createNamingOptions,
  loadNamingOptions,
} from "@/config/NamingOptions";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { StackResolverDefault } from "@/services/StackResolver";
import { VideoFileResolverDefault } from "@/services/VideoFileResolver";
import { VideoListResolverDefault } from "@/services/VideoListResolver";
import type { VideoFile, VideoItem } from "@/types";
import { expandHome } from "@/utils/helper";

type ResolveOptions = {
  kind?: string;
  libraryRoot?: string;
  naming?: string;
  report?: string;
};

export function registerResolveVideos(cli: CAC, baseLogger: Logger) {
  cli
    .command("resolve <folder>", "整理資料夾內的影片：堆疊、多版本與額外內容")
    .option(
      "--kind <kind>",
      "媒體類型：movies、tvshows、musicvideos、homevideos、mixed"
    )
    .option("--multi-version", "合併多版本（預設，VIDEO_MULTI_VERSION）")
    .option("--no-multi-version", "不合併多版本")
    .option("--parse-name", "解析堆疊片段的檔名（預設，VIDEO_PARSE_NAME）")
    .option("--no-parse-name", "不解析堆疊片段的檔名")
    .option("--library-root <path>", "媒體庫根目錄")
    .option("--naming <file>", "命名規則覆寫檔 (JSON)")
    .option("--report <dir>", "輸出 JSON 報告到指定目錄")
    .action(async (folder: string, options: ResolveOptions) => {
      const logger = baseLogger.extend("resolve", { folder });
      const config = getAppConfig();
      const root = expandHome(folder);

      // 1) 命名規則
      let namingOptions: NamingOptions;
      const namingFile = options.naming ?? config.VIDEO_NAMING_FILE;
      if (namingFile) {
        const loaded = await loadNamingOptions(expandHome(namingFile));
        if (isErr(loaded)) {
          logger.error({ error: loaded.error }, `讀取命名規則失敗: ${namingFile}`);
          process.exit(1);
        }
        namingOptions = loaded.value;
      } else {
        namingOptions = createNamingOptions();
      }

      const kindRes = parseMediaKind(options.kind ?? config.VIDEO_MEDIA_KIND);
      if (isErr(kindRes)) {
        logger.error({ error: kindRes.error }, kindRes.error.message);
        process.exit(1);
      }
      const mediaKind = kindRes.value;

      // 2) 掃描
      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(root, {
        allowExts: namingOptions.videoFileExtensions,
      });
      if (isErr(scanRes)) {
        logger.error({ emoji: "❌", error: scanRes.error })`掃描來源目錄失敗`;
        process.exit(1);
      }
      if (scanRes.value.length === 0) {
        logger.warn("來源目錄沒有影片檔案");
        return;
      }

      // 3) 解析
      const libraryRoot = options.libraryRoot ?? config.VIDEO_LIBRARY_ROOT ?? "";
      const videoFileResolver = new VideoFileResolverDefault({ namingOptions });
      const files = scanRes.value
        .map((e) =>
          videoFileResolver.resolve(e.fullPath, e.isDirectory, { libraryRoot })
        )
        .filter((f): f is VideoFile => f !== undefined);
      logger.info({ emoji: "🔎", count: files.length })`掃描完成`;

      const resolver = new VideoListResolverDefault({
        stackResolver: new StackResolverDefault({ namingOptions }),
        videoFileResolver,
        namingOptions,
        logger,
      });
      const items = resolver.resolve(files, {
        // cac 對 --no-xxx 一律給預設 true，要從原始參數判斷是否有明確指定
        supportMultiVersion:
          readFlag(cli.rawArgs, "multi-version") ?? config.VIDEO_MULTI_VERSION,
        parseName: readFlag(cli.rawArgs, "parse-name") ?? config.VIDEO_PARSE_NAME,
        libraryRoot,
        mediaKind,
      });

      logItems(logger, items);
      logger.info(
        { event: "done" },
        `共 ${files.length} 個檔案，整理為 ${items.length} 個項目`
      );

      if (options.report) {
        const reporter = new DumpWriterDefault(logger, expandHome(options.report));
        await reporter.dump("resolve", { folder: root, mediaKind, items });
      }
    });
}

/** 每個項目一行，訊息是純字串，context 不重複訊息內容 */
export function logItems(logger: Logger, items: readonly VideoItem[]) {
  for (const item of items) {
    logger.info(
      {
        emoji: item.extraType ? "🎞️" : "🎬",
        path: item.files[0].path,
      },
      describeItem(item)
    );
  }
}

export function describeItem(item: VideoItem) {
  const title = item.year ? `${item.name} (${item.year})` : item.name;
  const parts: string[] = [title];
  if (item.extraType) parts.push(`[${item.extraType}]`);
  if (item.files.length > 1) parts.push(`${item.files.length} 片`);
  if (item.alternateVersions.length > 0) {
    parts.push(`+${item.alternateVersions.length} 個版本`);
  }
  return parts.join(" ");
}

import { Value } from "@sinclair/typebox/value";

import type { Logger } from "~shared/Logger";

import type { NamingOptions } from "@/config/NamingOptions";
import type { StackResolver } from "@/services/StackResolver";
import {
  EpisodeVersionGrouper,
  MovieVersionGrouper,
  type VersionGrouper,
} from "@/services/VersionGrouper";
import type { VideoFileResolver } from "@/services/VideoFileResolver";
import { MediaKindSchema, type VideoFile, type VideoItem } from "@/types";

import { buildTitleItems, partitionVideoFiles } from "./partition";
import {
  UnsupportedMediaKindError,
  type VideoListResolveOptions,
  type VideoListResolver,
} from "./VideoListResolver";

/**
 * 流程：分出堆疊／獨立／額外內容 → 建立項目 → 依媒體類型合併多版本 → 附加額外內容。
 */
export class VideoListResolverDefault implements VideoListResolver {
  private readonly stackResolver: StackResolver;
  private readonly videoFileResolver: VideoFileResolver;
  private readonly movieGrouper: VersionGrouper;
  private readonly episodeGrouper: VersionGrouper;
  private readonly logger: Logger;

  constructor(deps: {
    stackResolver: StackResolver;
    videoFileResolver: VideoFileResolver;
    namingOptions: NamingOptions;
    logger: Logger;
  }) {
    this.stackResolver = deps.stackResolver;
    this.videoFileResolver = deps.videoFileResolver;
    this.logger = deps.logger.extend("VideoListResolverDefault");
    this.movieGrouper = new MovieVersionGrouper(deps);
    this.episodeGrouper = new EpisodeVersionGrouper(deps);
  }

  resolve(
    files: readonly VideoFile[],
    options: VideoListResolveOptions = {}
  ): VideoItem[] {
    const {
      supportMultiVersion = true,
      parseName = true,
      libraryRoot = "",
      mediaKind,
    } = options;
    if (mediaKind !== undefined && !Value.Check(MediaKindSchema, mediaKind)) {
      throw new UnsupportedMediaKindError(mediaKind);
    }

    const partition = partitionVideoFiles(files, this.stackResolver);
    this.logger.debug({
      event: "partition",
      stacks: partition.stacks.length,
      standalone: partition.standalone.length,
      extras: partition.extras.length,
    })`共 ${files.length} 個檔案`;

    let items = buildTitleItems(partition, this.videoFileResolver, {
      parseName,
      libraryRoot,
    });

    if (supportMultiVersion) {
      const grouper =
        mediaKind === "tvshows" ? this.episodeGrouper : this.movieGrouper;
      items = grouper.group(items);
    }

    return [
      ...items,
      ...partition.extras.map((file) => ({
        name: file.name,
        year: file.year,
        files: [file],
        alternateVersions: [],
        extraType: file.extraType,
      })),
    ];
  }
}

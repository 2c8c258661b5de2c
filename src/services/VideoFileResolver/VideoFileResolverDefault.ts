import path from "node:path";

import { type NamingOptions, isVideoFile } from "@/config/NamingOptions";
import { cleanDateTime } from "@/naming/CleanDateTimeParser";
import { tryCleanString } from "@/naming/CleanStringParser";
import { getExtraType } from "@/naming/ExtraRuleResolver";
import type { VideoFile } from "@/types";
import { baseName } from "@/utils/helper";

import type {
  VideoFileResolveOptions,
  VideoFileResolver,
} from "./VideoFileResolver";

export class VideoFileResolverDefault implements VideoFileResolver {
  private readonly namingOptions: NamingOptions;

  constructor(deps: { namingOptions: NamingOptions }) {
    this.namingOptions = deps.namingOptions;
  }

  resolve(
    filePath: string,
    isDirectory: boolean,
    options: VideoFileResolveOptions = {}
  ): VideoFile | undefined {
    if (!filePath) return undefined;
    const { parseName = true, libraryRoot = "" } = options;

    let container: string | undefined;
    if (!isDirectory) {
      if (!isVideoFile(filePath, this.namingOptions)) return undefined;
      container = path.extname(filePath).slice(1);
    }

    let name = baseName(filePath, isDirectory);
    let year: number | undefined;
    if (parseName) {
      const cleaned = cleanDateTime(name, this.namingOptions.cleanDateTimes);
      name = cleaned.name;
      year = cleaned.year;
      name = tryCleanString(name, this.namingOptions.cleanStrings) ?? name;
    }

    return {
      path: filePath,
      isDirectory,
      name,
      year,
      extraType: getExtraType(filePath, this.namingOptions, libraryRoot),
      container,
    };
  }
}

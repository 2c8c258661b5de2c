import type { VideoFile, VideoItem } from "@/types";
import { fileNameWithoutExtension } from "@/utils/helper";

export function videoFile(
  filePath: string,
  overrides: Partial<VideoFile> = {}
): VideoFile {
  return {
    path: filePath,
    isDirectory: false,
    name: fileNameWithoutExtension(filePath),
    container: "mkv",
    ...overrides,
  };
}

export function singleItem(file: VideoFile): VideoItem {
  return {
    name: file.name,
    year: file.year,
    files: [file],
    alternateVersions: [],
    extraType: file.extraType,
  };
}

export function allPaths(items: readonly VideoItem[]) {
  return items
    .flatMap((item) => [...item.files, ...item.alternateVersions])
    .map((f) => f.path);
}

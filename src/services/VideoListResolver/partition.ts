import type { FileStack, StackResolver } from "@/services/StackResolver";
import type {
  VideoFileResolveOptions,
  VideoFileResolver,
} from "@/services/VideoFileResolver";
import type { VideoFile, VideoItem } from "@/types";

export type VideoPartition = {
  stacks: FileStack[];
  /** 不屬於任何堆疊的正片 */
  standalone: VideoFile[];
  /** 不屬於任何堆疊的額外內容，最後原封不動附加 */
  extras: VideoFile[];
};

/**
 * 額外內容不參與堆疊偵測，避免預告片被當成 part2 併進正片。
 */
export function partitionVideoFiles(
  files: readonly VideoFile[],
  stackResolver: StackResolver
): VideoPartition {
  const stacks = stackResolver.resolve(
    files
      .filter((f) => f.extraType === undefined)
      .map((f) => ({ fullPath: f.path, isDirectory: f.isDirectory }))
  );

  const standalone: VideoFile[] = [];
  const extras: VideoFile[] = [];
  for (const file of files) {
    if (stacks.some((s) => s.containsFile(file.path, file.isDirectory))) {
      continue;
    }
    if (file.extraType === undefined) standalone.push(file);
    else extras.push(file);
  }
  return { stacks, standalone, extras };
}

/**
 * 每個堆疊、每個獨立正片各建一個項目。順序：堆疊在前，獨立正片依輸入順序。
 */
export function buildTitleItems(
  partition: Pick<VideoPartition, "stacks" | "standalone">,
  videoFileResolver: VideoFileResolver,
  options: VideoFileResolveOptions = {}
): VideoItem[] {
  const items: VideoItem[] = [];

  for (const stack of partition.stacks) {
    const files = stack.files
      .map((p) => videoFileResolver.resolve(p, stack.isDirectoryStack, options))
      .filter((f): f is VideoFile => f !== undefined);
    if (files.length === 0) continue;
    items.push({
      name: stack.name,
      year: files[0].year,
      files,
      alternateVersions: [],
    });
  }

  for (const file of partition.standalone) {
    items.push({
      name: file.name,
      year: file.year,
      files: [file],
      alternateVersions: [],
    });
  }

  return items;
}

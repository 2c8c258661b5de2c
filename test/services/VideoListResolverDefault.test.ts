import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { createNamingOptions } from "@/config/NamingOptions";
import { type StackResolver, StackResolverDefault } from "@/services/StackResolver";
import { VideoFileResolverDefault } from "@/services/VideoFileResolver";
import {
  UnsupportedMediaKindError,
  type VideoListResolveOptions,
  VideoListResolverDefault,
} from "@/services/VideoListResolver";
import type { VideoFile } from "@/types";
import { StackResolverFake } from "~test/fakes/StackResolverFake";
import { allPaths } from "~test/fakes/videoFixtures";

const namingOptions = createNamingOptions();
const videoFileResolver = new VideoFileResolverDefault({ namingOptions });

function buildResolver(
  stackResolver: StackResolver = new StackResolverDefault({ namingOptions })
) {
  return new VideoListResolverDefault({
    stackResolver,
    videoFileResolver,
    namingOptions,
    logger: buildTestLogger(),
  });
}

function resolveFiles(...paths: string[]): VideoFile[] {
  return paths
    .map((p) => videoFileResolver.resolve(p, false))
    .filter((f): f is VideoFile => f !== undefined);
}

const movieDir = "/movies/Movie (2020)";
const movieFiles = () =>
  resolveFiles(
    `${movieDir}/Movie (2020).mkv`,
    `${movieDir}/Movie (2020) - [1080p].mkv`,
    `${movieDir}/Movie (2020) - [4K].mkv`,
    `${movieDir}/Movie (2020)-trailer.mkv`
  );

describe("VideoListResolverDefault", () => {
  test("電影資料夾合併為一個項目，額外內容附加在最後", () => {
    const resolver = buildResolver();
    const result = resolver.resolve(movieFiles(), { mediaKind: "movies" });

    expect(result.length).toBe(2);
    const [movie, trailer] = result;
    expect(movie.name).toBe("Movie (2020)");
    expect(movie.year).toBe(2020);
    expect(movie.files.map((f) => f.path)).toEqual([`${movieDir}/Movie (2020).mkv`]);
    expect(movie.alternateVersions.map((f) => f.path)).toEqual([
      `${movieDir}/Movie (2020) - [1080p].mkv`,
      `${movieDir}/Movie (2020) - [4K].mkv`,
    ]);
    expect(trailer.name).toBe("Movie");
    expect(trailer.year).toBe(2020);
    expect(trailer.extraType).toBe("trailer");
    expect(trailer.files.map((f) => f.path)).toEqual([
      `${movieDir}/Movie (2020)-trailer.mkv`,
    ]);
    expect(trailer.alternateVersions).toEqual([]);
  });

  test("未指定媒體類型時以電影方式分組", () => {
    const resolver = buildResolver();
    const result = resolver.resolve(movieFiles());
    expect(result.length).toBe(2);
    expect(result[0].alternateVersions.length).toBe(2);
  });

  test("影集依集數合併版本", () => {
    const resolver = buildResolver();
    const season = "/tv/Show/Season 01";
    const result = resolver.resolve(
      resolveFiles(`${season}/Show S01E01.mkv`, `${season}/Show S01E01 - [1080p].mkv`),
      { mediaKind: "tvshows" }
    );

    expect(result.length).toBe(1);
    expect(result[0].name).toBe("Show S01E01");
    expect(result[0].files.map((f) => f.path)).toEqual([
      `${season}/Show S01E01.mkv`,
    ]);
    expect(result[0].alternateVersions.map((f) => [f.path, f.versionTag])).toEqual([
      [`${season}/Show S01E01 - [1080p].mkv`, "1080p"],
    ]);
  });

  test("多片段堆疊成為一個項目", () => {
    const resolver = buildResolver();
    const result = resolver.resolve(
      resolveFiles("/movies/Movie/Movie-cd1.mkv", "/movies/Movie/Movie-cd2.mkv")
    );
    expect(result.length).toBe(1);
    expect(result[0].name).toBe("Movie");
    expect(result[0].files.map((f) => f.path)).toEqual([
      "/movies/Movie/Movie-cd1.mkv",
      "/movies/Movie/Movie-cd2.mkv",
    ]);
    expect(result[0].alternateVersions).toEqual([]);
  });

  test("關閉多版本時每個檔案各自成為項目", () => {
    const resolver = buildResolver();
    const result = resolver.resolve(movieFiles(), { supportMultiVersion: false });
    expect(result.map((item) => item.files[0].path)).toEqual([
      `${movieDir}/Movie (2020).mkv`,
      `${movieDir}/Movie (2020) - [1080p].mkv`,
      `${movieDir}/Movie (2020) - [4K].mkv`,
      `${movieDir}/Movie (2020)-trailer.mkv`,
    ]);
  });

  test("每個輸入檔案恰好出現一次", () => {
    const resolver = buildResolver();
    const files = [
      ...movieFiles(),
      ...resolveFiles(
        `${movieDir}/Other Film.mkv`,
        `${movieDir}/Movie-cd1.mkv`,
        `${movieDir}/Movie-cd2.mkv`
      ),
    ];

    const result = resolver.resolve(files);

    expect(allPaths(result).sort()).toEqual(files.map((f) => f.path).sort());
  });

  test("不支援的媒體類型在處理前就拋出錯誤", () => {
    const stackResolver = new StackResolverFake();
    const resolver = buildResolver(stackResolver);
    const options: VideoListResolveOptions = JSON.parse('{"mediaKind":"anime"}');

    expect(() => resolver.resolve(movieFiles(), options)).toThrow(
      UnsupportedMediaKindError
    );
    expect(stackResolver.calls).toEqual([]);
  });

  test("空輸入得到空清單", () => {
    expect(buildResolver().resolve([])).toEqual([]);
  });
});

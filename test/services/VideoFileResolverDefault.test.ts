import { describe, expect, test } from "vitest";

import { createNamingOptions } from "@/config/NamingOptions";
import { VideoFileResolverDefault } from "@/services/VideoFileResolver";

const resolver = new VideoFileResolverDefault({
  namingOptions: createNamingOptions(),
});

describe("VideoFileResolverDefault", () => {
  test("拆出年份與副檔名", () => {
    const filePath = "/movies/Movie (2020)/Movie (2020) - [1080p].mkv";
    expect(resolver.resolve(filePath, false)).toEqual({
      path: filePath,
      isDirectory: false,
      name: "Movie",
      year: 2020,
      extraType: undefined,
      container: "mkv",
    });
  });

  test("parseName=false 保留原始檔名", () => {
    const result = resolver.resolve(
      "/movies/Movie (2020)/Movie (2020) - [1080p].mkv",
      false,
      { parseName: false }
    );
    expect(result?.name).toBe("Movie (2020) - [1080p]");
    expect(result?.year).toBeUndefined();
  });

  test("額外內容", () => {
    const result = resolver.resolve("/movies/Movie/Movie-trailer.mp4", false);
    expect(result?.name).toBe("Movie");
    expect(result?.extraType).toBe("trailer");
    expect(result?.container).toBe("mp4");
  });

  test("非影片檔回傳 undefined", () => {
    expect(resolver.resolve("/movies/Movie/readme.txt", false)).toBeUndefined();
    expect(resolver.resolve("", false)).toBeUndefined();
  });

  test("資料夾沒有副檔名與容器格式", () => {
    const result = resolver.resolve("/movies/Some.Folder", true, {
      parseName: false,
    });
    expect(result).toEqual({
      path: "/movies/Some.Folder",
      isDirectory: true,
      name: "Some.Folder",
      year: undefined,
      extraType: undefined,
      container: undefined,
    });
  });
});

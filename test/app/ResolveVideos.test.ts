import { describe, expect, test } from "vitest";

import { LogTransportMemory, buildTestLogger } from "~shared/testkit/TestLogger";

import { describeItem, logItems } from "@/app/ResolveVideos";
import { videoFile } from "~test/fakes/videoFixtures";

describe("describeItem", () => {
  test("多版本", () => {
    expect(
      describeItem({
        name: "Movie (2020)",
        files: [videoFile("/m/Movie (2020).mkv")],
        alternateVersions: [
          videoFile("/m/Movie (2020) - 1080p.mkv"),
          videoFile("/m/Movie (2020) - 720p.mkv"),
        ],
      })
    ).toBe("Movie (2020) +2 個版本");
  });

  test("堆疊與年份", () => {
    expect(
      describeItem({
        name: "Movie",
        year: 1999,
        files: [videoFile("/m/Movie-cd1.mkv"), videoFile("/m/Movie-cd2.mkv")],
        alternateVersions: [],
      })
    ).toBe("Movie (1999) 2 片");
  });

  test("額外內容", () => {
    expect(
      describeItem({
        name: "Movie",
        files: [videoFile("/m/Movie-trailer.mkv")],
        alternateVersions: [],
        extraType: "trailer",
      })
    ).toBe("Movie [trailer]");
  });
});

describe("logItems", () => {
  test("每個項目一筆 info，context 不重複訊息內容", () => {
    const transport = new LogTransportMemory();
    logItems(buildTestLogger(transport), [
      {
        name: "Movie (2020)",
        files: [videoFile("/m/Movie (2020).mkv")],
        alternateVersions: [videoFile("/m/Movie (2020) - 1080p.mkv")],
      },
    ]);

    const records = transport.byLevel("info");
    expect(records.length).toBe(1);
    expect(records[0].msg).toBe("Movie (2020) +1 個版本");
    expect(records[0].context).toEqual({ path: "/m/Movie (2020).mkv" });
  });
});

export type CleanDateTimeResult = {
  name: string;
  year?: number;
};

/**
 * 從名稱拆出年份：`Movie (2020) [1080p]` → `{ name: "Movie", year: 2020 }`。
 * 規則需有四個群組，第 1 組是標題、第 2 組是年份；只採用第一條命中的規則。
 */
export function cleanDateTime(
  name: string,
  patterns: readonly RegExp[]
): CleanDateTimeResult {
  for (const pattern of patterns) {
    const match = pattern.exec(name);
    if (
      !match ||
      match.length !== 5 ||
      match[1] === undefined ||
      match[2] === undefined
    ) {
      continue;
    }
    const year = Number.parseInt(match[2], 10);
    if (Number.isNaN(year)) continue;
    return { name: match[1].trimEnd(), year };
  }
  return { name };
}

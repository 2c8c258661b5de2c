import {
  compareAlphanumeric,
  compareAlphanumericDesc,
} from "@/naming/AlphanumericComparator";

export type VersionOrderOptions<T> = {
  resolution: RegExp;
  /** 排序與解析度擷取用的檔名（不含副檔名） */
  baseName: (item: T) => string;
  /** 判斷是否帶解析度標記的文字，預設同 baseName */
  bucketText?: (item: T) => string;
};

/**
 * 帶解析度標記的排在前面，依解析度遞減、再依檔名遞增；
 * 其餘依檔名遞增。皆為自然排序。
 */
export function orderVersions<T>(
  items: readonly T[],
  options: VersionOrderOptions<T>
): T[] {
  const { resolution, baseName } = options;
  const bucketText = options.bucketText ?? baseName;
  const resolutionOf = (item: T) => resolution.exec(baseName(item))?.[0] ?? "";

  const marked: T[] = [];
  const plain: T[] = [];
  for (const item of items) {
    if (resolution.test(bucketText(item))) marked.push(item);
    else plain.push(item);
  }

  marked.sort(
    (a, b) =>
      compareAlphanumericDesc(resolutionOf(a), resolutionOf(b)) ||
      compareAlphanumeric(baseName(a), baseName(b))
  );
  plain.sort((a, b) => compareAlphanumeric(baseName(a), baseName(b)));

  return [...marked, ...plain];
}

const collator = new Intl.Collator("en");

function isDigit(ch: string) {
  return ch >= "0" && ch <= "9";
}

/**
 * 自然排序：字串中的數字段以數值比較。
 * "Movie 720p" < "Movie 1080p"、"Part 2" < "Part 10"
 * 文字段使用固定的 en collator，結果不受執行環境語系影響。
 */
export function compareAlphanumeric(
  a: string | null | undefined,
  b: string | null | undefined
): number {
  if (a == null && b == null) return 0;
  if (a == null) return -1;
  if (b == null) return 1;
  if (a.length === 0 && b.length === 0) return 0;
  if (a.length === 0) return -1;
  if (b.length === 0) return 1;

  let posA = 0;
  let posB = 0;
  do {
    const startA = posA;
    const startB = posB;
    const numA = isDigit(a[posA++]);
    const numB = isDigit(b[posB++]);
    while (posA < a.length && isDigit(a[posA]) === numA) posA++;
    while (posB < b.length && isDigit(b[posB]) === numB) posB++;

    let chunkA = a.slice(startA, posA);
    let chunkB = b.slice(startB, posB);

    if (numA && numB) {
      chunkA = chunkA.replace(/^0+/, "");
      chunkB = chunkB.replace(/^0+/, "");
      if (chunkA.length !== chunkB.length) {
        return chunkA.length < chunkB.length ? -1 : 1;
      }
      // 等長數字字串，字典序即數值順序
      if (chunkA !== chunkB) return chunkA < chunkB ? -1 : 1;
    } else {
      const result = collator.compare(chunkA, chunkB);
      if (result !== 0) return Math.sign(result);
    }
  } while (posA < a.length && posB < b.length);

  return Math.sign(a.length - b.length);
}

/** 反向比較，供遞減排序使用 */
export function compareAlphanumericDesc(
  a: string | null | undefined,
  b: string | null | undefined
): number {
  return compareAlphanumeric(b, a);
}

/**
 * 依序套用所有規則去除發行標記（畫質、編碼、發行組等）。
 * 每條命中且有 `cleaned` 群組的規則都會取代目前字串，後面的規則作用在結果上。
 * 沒有任何規則命中時回傳 undefined。
 */
export function tryCleanString(
  name: string,
  patterns: readonly RegExp[]
): string | undefined {
  if (!name) return undefined;

  let current = name;
  let cleaned = false;
  for (const pattern of patterns) {
    const match = pattern.exec(current);
    const value = match?.groups?.cleaned;
    if (value !== undefined) {
      current = value;
      cleaned = true;
    }
  }
  return cleaned ? current : undefined;
}

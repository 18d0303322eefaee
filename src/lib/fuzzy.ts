/**
 * Fuzzy search module using Levenshtein distance
 * 模糊搜尋模組，用於站點名稱建議
 */

/**
 * 計算兩個字串之間的 Levenshtein 編輯距離
 */
export function levenshteinDistance(a: string, b: string): number {
  const source = Array.from(a);
  const target = Array.from(b);

  if (source.length === 0) return target.length;
  if (target.length === 0) return source.length;

  // 只保留上一列即可
  let previous = Array.from({ length: target.length + 1 }, (_, j) => j);

  for (let i = 1; i <= source.length; i++) {
    const current = [i];
    for (let j = 1; j <= target.length; j++) {
      const cost = source[i - 1] === target[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j - 1] + cost, // 替換
        current[j - 1] + 1,     // 插入
        previous[j] + 1         // 刪除
      );
    }
    previous = current;
  }

  return previous[target.length];
}

/**
 * 取得最相近的前 N 個候選
 * 包含輸入字串者優先，其次依編輯距離排序
 */
export function getTopCandidates(
  input: string,
  candidates: readonly string[],
  limit: number = 5
): string[] {
  const query = input.trim();
  if (query.length === 0 || limit <= 0) {
    return [];
  }

  const scored = candidates.map((name, index) => ({
    name,
    index,
    contains: name.includes(query),
    distance: levenshteinDistance(query, name),
  }));

  scored.sort((a, b) => {
    if (a.contains !== b.contains) return a.contains ? -1 : 1;
    if (a.distance !== b.distance) return a.distance - b.distance;
    return a.index - b.index;
  });

  return scored.slice(0, limit).map((s) => s.name);
}

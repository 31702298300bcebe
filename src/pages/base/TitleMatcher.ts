/**
 * 제목 매칭
 *
 * 우선순위:
 * 1. 대소문자 무시 완전 일치 (trim 후)
 * 2. 대소문자 무시 부분 일치 (문서 순서상 첫 번째)
 */

export type TitleMatchKind = "exact" | "substring";

export interface TitleMatch {
  index: number;
  title: string;
  kind: TitleMatchKind;
}

export function matchTitle(
  titles: readonly string[],
  query: string,
): TitleMatch | null {
  const needle = query.trim().toLowerCase();
  if (needle.length === 0) {
    return null;
  }

  const exact = titles.findIndex(
    (title) => title.trim().toLowerCase() === needle,
  );
  if (exact >= 0) {
    return { index: exact, title: titles[exact], kind: "exact" };
  }

  const partial = titles.findIndex((title) =>
    title.toLowerCase().includes(needle),
  );
  if (partial >= 0) {
    return { index: partial, title: titles[partial], kind: "substring" };
  }

  return null;
}

/**
 * HTMLユーティリティ
 *
 * @description 経済指標カレンダーの正規表現スクレイピング用ヘルパー
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const MAX_CODE_POINT = 0x10ffff;

/**
 * HTMLエンティティをデコード
 *
 * 名前付き（&amp; 等の主要なもの）と数値参照（&#37; / &#x25;）に対応
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith('#')) {
      const isHex = body[1] === 'x' || body[1] === 'X';
      const codePoint = parseInt(body.slice(isHex ? 2 : 1), isHex ? 16 : 10);
      // 範囲外の数値参照は変換しない
      return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

/**
 * タグを除去してテキストのみを取り出す
 */
export function stripTags(html: string): string {
  return html
    .replace(/<(script|style)\b[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<[^>]*>/g, ' ');
}

/**
 * 空白を1つに詰めて前後をトリム
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * セルの innerHTML を表示テキストに変換
 */
export function cellText(innerHtml: string): string {
  return cleanText(decodeEntities(stripTags(innerHtml)));
}

/**
 * Strip tags and decode the entities Hacker News emits in item text.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const hex = entity[1] === 'x' || entity[1] === 'X';
      const code = parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      return Number.isNaN(code) || code > 0x10ffff ? match : String.fromCodePoint(code);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

export function stripHtml(html: string): string {
  const text = html
    .replace(/<p>/gi, '\n\n')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]*>/g, '');

  return decodeEntities(text).trim();
}

/**
 * Cut to at most `maxLength` code points, never splitting a surrogate pair.
 */
export function truncate(text: string, maxLength: number): string {
  // Code points never outnumber UTF-16 units
  if (text.length <= maxLength) return text;
  return Array.from(text).slice(0, maxLength).join('');
}

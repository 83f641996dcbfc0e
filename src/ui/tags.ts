import stringWidth from 'string-width';

/**
 * Escape blessed tag braces in user-controlled text (file names, messages).
 */
export function escapeTags(content: string): string {
  return content.replace(/[{}]/g, (brace) => (brace === '{' ? '{open}' : '{close}'));
}

/**
 * Terminal columns taken by tagged content once blessed has parsed the tags.
 */
export function taggedWidth(content: string): number {
  const plain = content.replace(/\{(\/?[a-z-]*)\}/g, (_, tag: string) => {
    if (tag === 'open') return '{';
    if (tag === 'close') return '}';
    return '';
  });
  return stringWidth(plain);
}

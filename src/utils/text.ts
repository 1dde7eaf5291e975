// Unicode-aware word boundaries: letters such as å/ä/ö and digits such as ² are word characters.
export const WORD_START = '(?<![\\p{L}\\p{N}_])';
export const WORD_END = '(?![\\p{L}\\p{N}_])';

export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

export function truncate(input: string, max: number): string {
  return input.length > max ? input.slice(0, max) : input;
}

export function truncateAtWord(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }

  const kept: string[] = [];
  let length = 0;
  for (const word of input.split(/\s+/).filter(Boolean)) {
    if (length + word.length + 1 > max) {
      break;
    }
    kept.push(word);
    length += word.length + 1;
  }
  return kept.join(' ');
}

export function includesIgnoreCase(haystack: string | null | undefined, needle: string): boolean {
  return (haystack ?? '').toLowerCase().includes(needle.toLowerCase());
}

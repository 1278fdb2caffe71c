// Lengths here count code points, so an emoji is one character and is never split.

export function truncateChars(text: string, max: number) {
  const chars = Array.from(text);
  return chars.length <= max ? text : chars.slice(0, max).join('');
}

export function padChars(text: string, width: number) {
  const length = Array.from(text).length;
  return length >= width ? text : text + ' '.repeat(width - length);
}

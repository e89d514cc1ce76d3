/** Telegram rejects messages longer than 4096 characters. */
export const MESSAGE_CHUNK_SIZE = 4000;

/**
 * Split a long message into chunks of at most `size` characters, cutting at
 * the last newline inside each window when there is one.
 */
export function chunkText(text: string, size: number = MESSAGE_CHUNK_SIZE): string[] {
  if (text.length <= size) {
    return [text];
  }

  const chunks: string[] = [];
  let rest = text;

  while (rest.length > size) {
    const cut = rest.slice(0, size).lastIndexOf('\n');
    if (cut > 0) {
      chunks.push(rest.slice(0, cut));
      rest = rest.slice(cut + 1);
    } else {
      chunks.push(rest.slice(0, size));
      rest = rest.slice(size);
    }
  }

  if (rest.length > 0) {
    chunks.push(rest);
  }
  return chunks;
}

/** Escape user-supplied text for Telegram's legacy Markdown parse mode. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

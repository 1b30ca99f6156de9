const WHITESPACE = ' \t\n\r';
const VALUE_END = ',}] \t\n\r';

/**
 * Keys of the object stored under `field` in the top-level object of `text`,
 * in the order they appear. `JSON.parse` moves integer-like keys to the
 * front; this keeps the document's order. `text` must be valid JSON.
 */
export function documentKeyOrder(text: string, field: string): string[] {
  let pos = 0;

  const peek = (): string => text.charAt(pos);

  const skipWhitespace = (): void => {
    while (pos < text.length && WHITESPACE.includes(peek())) pos++;
  };

  const readString = (): string => {
    const start = pos;
    pos++;
    while (pos < text.length && peek() !== '"') {
      if (peek() === '\\') pos++;
      pos++;
    }
    pos++;
    const value: unknown = JSON.parse(text.slice(start, pos));
    return typeof value === 'string' ? value : '';
  };

  // Calls `onMember` for each member of the object at `pos`, leaving `pos`
  // on its value; `onMember` must consume that value.
  const readObject = (onMember: (key: string) => void): void => {
    pos++;
    skipWhitespace();
    if (peek() === '}') {
      pos++;
      return;
    }
    while (pos < text.length) {
      skipWhitespace();
      const key = readString();
      skipWhitespace();
      pos++;
      skipWhitespace();
      onMember(key);
      skipWhitespace();
      const separator = peek();
      pos++;
      if (separator === '}') return;
    }
  };

  const skipValue = (): void => {
    skipWhitespace();
    const ch = peek();
    if (ch === '"') {
      readString();
    } else if (ch === '{') {
      readObject(() => skipValue());
    } else if (ch === '[') {
      pos++;
      skipWhitespace();
      if (peek() === ']') {
        pos++;
        return;
      }
      while (pos < text.length) {
        skipValue();
        skipWhitespace();
        const separator = peek();
        pos++;
        if (separator === ']') return;
      }
    } else {
      while (pos < text.length && !VALUE_END.includes(peek())) pos++;
    }
  };

  let keys: string[] = [];
  skipWhitespace();
  if (peek() !== '{') return keys;

  readObject((key) => {
    if (key !== field || peek() !== '{') {
      skipValue();
      return;
    }
    // A repeated field replaces the earlier one, as in JSON.parse.
    const found: string[] = [];
    readObject((member) => {
      found.push(member);
      skipValue();
    });
    keys = found;
  });
  return keys;
}

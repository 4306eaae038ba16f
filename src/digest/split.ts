/**
 * Cuts `text` into fragments of at most `maxLength` UTF-16 units.
 *
 * Fragments break between lines; a single line longer than `maxLength` is
 * hard-cut into consecutive chunks, never inside a surrogate pair. Joining
 * whole-line fragments with "\n" gives back the input, minus blank lines at
 * fragment boundaries.
 */
export function splitMessage(text: string, maxLength: number): Array<string> {
  if (maxLength < 2) {
    throw new RangeError(`maxLength must be at least 2, got ${maxLength}`);
  }
  if (text.length <= maxLength) return [text];

  const fragments: Array<string> = [];
  let current: Array<string> = [];
  let currentLength = 0;

  const flush = () => {
    const fragment = current.join("\n").replace(/^\n+|\n+$/g, "");
    if (fragment.trim().length > 0) fragments.push(fragment);
    current = [];
    currentLength = 0;
  };

  for (const line of text.split("\n")) {
    if (line.length > maxLength) {
      flush();
      let rest = line;
      while (rest.length > maxLength) {
        const cut = safeCut(rest, maxLength);
        fragments.push(rest.slice(0, cut));
        rest = rest.slice(cut);
      }
      if (rest.length > 0) {
        current = [rest];
        currentLength = rest.length;
      }
      continue;
    }

    const nextLength =
      current.length === 0 ? line.length : currentLength + 1 + line.length;
    if (nextLength <= maxLength) {
      current.push(line);
      currentLength = nextLength;
    } else {
      flush();
      current = [line];
      currentLength = line.length;
    }
  }
  flush();

  return fragments;
}

function safeCut(text: string, maxLength: number): number {
  const last = text.charCodeAt(maxLength - 1);
  // high surrogate: keep the pair together in the next chunk
  return last >= 0xd800 && last <= 0xdbff ? maxLength - 1 : maxLength;
}

/**
 * Parse a stream of JSON objects written back to back, one per line or
 * pretty-printed over several lines (`jq -n ... >> file` output).
 *
 * A value that does not parse is counted as corrupt and scanning resumes at
 * the next line, so a record cut short by an interrupted write only loses
 * itself.
 */
export function parseConcatenatedJson(text: string): { values: unknown[]; corrupt: number } {
  const values: unknown[] = [];
  let corrupt = 0;
  let pos = 0;

  while (pos < text.length) {
    if (/\s/.test(text[pos])) {
      pos++;
      continue;
    }

    const end = text[pos] === '{' ? findObjectEnd(text, pos) : -1;
    if (end !== -1) {
      const parsed = tryParse(text.slice(pos, end));
      if (parsed.ok) {
        values.push(parsed.value);
        pos = end;
        continue;
      }
    }

    corrupt++;
    pos = nextLineStart(text, pos);
  }

  return { values, corrupt };
}

function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function tryParse(slice: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(slice) };
  } catch {
    return { ok: false };
  }
}

function nextLineStart(text: string, pos: number): number {
  const newline = text.indexOf('\n', pos);
  return newline === -1 ? text.length : newline + 1;
}

/**
 * Returns the first complete JSON object in an agent's reply, or undefined.
 *
 * Agents wrap their answer in prose or a fenced block, and the prose may
 * itself contain braces ("returns {x}"), so every `{` is tried as a start
 * until one balances into something JSON.parse accepts as an object.
 */
export function findJsonObject(text: string): Record<string, unknown> | undefined {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = matchingBrace(text, start);
    if (end === -1) {
      continue;
    }
    const candidate = parseObject(text.slice(start, end + 1));
    if (candidate) {
      return candidate;
    }
  }
  return undefined;
}

/** Index of the brace closing the one at `start`, ignoring braces in strings. */
function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function parseObject(candidate: string): Record<string, unknown> | undefined {
  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch {
    return undefined;
  }
  return isRecord(value) ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

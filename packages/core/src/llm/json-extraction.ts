export type JsonExtraction =
  | { readonly found: true; readonly value: unknown }
  | { readonly found: false };

/**
 * Pulls the first JSON value out of model output that may wrap it in a
 * markdown fence or surrounding prose.
 */
export function tryExtractJson(content: string): JsonExtraction {
  const trimmed = content.trim();

  const direct = tryParse(trimmed);
  if (direct.found) {
    return direct;
  }

  const fenced = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/.exec(trimmed);
  if (fenced?.[1]) {
    const fromFence = tryParse(fenced[1].trim());
    if (fromFence.found) {
      return fromFence;
    }
  }

  // Objects before arrays: a grouping answer is an object that contains arrays.
  const object = extractBalanced(trimmed, '{', '}');
  if (object.found) {
    return object;
  }

  return extractBalanced(trimmed, '[', ']');
}

export function extractJson(content: string): unknown {
  const result = tryExtractJson(content);
  if (!result.found) {
    throw new SyntaxError(`Failed to extract JSON from content: ${content.trim().slice(0, 100)}`);
  }
  return result.value;
}

function tryParse(text: string): JsonExtraction {
  if (text.length === 0) {
    return { found: false };
  }
  try {
    const value: unknown = JSON.parse(text);
    return { found: true, value };
  } catch {
    return { found: false };
  }
}

function extractBalanced(text: string, open: string, close: string): JsonExtraction {
  let startIdx = text.indexOf(open);

  while (startIdx !== -1) {
    const endIdx = findClosing(text, startIdx, open, close);
    if (endIdx === -1) {
      return { found: false };
    }
    const candidate = tryParse(text.slice(startIdx, endIdx + 1));
    if (candidate.found) {
      return candidate;
    }
    startIdx = text.indexOf(open, startIdx + 1);
  }

  return { found: false };
}

function findClosing(text: string, startIdx: number, open: string, close: string): number {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIdx; i < text.length; i++) {
    const ch = text[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (ch === '\\' && inString) {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) {
      continue;
    }

    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }

  return -1;
}

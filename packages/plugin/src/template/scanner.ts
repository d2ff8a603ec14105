/**
 * Template scanner
 *
 * Splits a command template into literal text and `{...}` markers, and
 * parses marker bodies. Scanning is brace-balanced so markers nest.
 *
 * Literal forms:
 * - `{{` and `}}` are single braces
 * - `${...}` and `#{...}` are copied verbatim (shell and tmux formats)
 * - a `{` without a matching `}` is literal text
 *
 * @module plugin/template/scanner
 */

export type Segment = { kind: "text"; text: string } | { kind: "marker"; body: string };

export interface LookupEntry {
  key: string;
  value: string;
}

/**
 * Parsed marker body. `name` and `field` may still contain markers to splice.
 */
export type Marker =
  | { kind: "conditional"; field: string; body?: string }
  | { kind: "value"; name: string; required: boolean }
  | { kind: "lookup"; name: string; required: boolean; entries: LookupEntry[] };

/** Key of the fallback entry in a lookup table */
export const DEFAULT_KEY = "default";

/**
 * Index of the `}` closing the `{` at `open`, or -1.
 */
export function findClosing(text: string, open: number): number {
  let depth = 0;
  for (let index = open; index < text.length; index++) {
    const char = text[index];
    if (char === "{") {
      depth++;
    } else if (char === "}") {
      depth--;
      if (depth === 0) {
        return index;
      }
    }
  }
  return -1;
}

/**
 * First index of `char` outside any braces, or -1.
 */
export function indexOfTopLevel(text: string, char: string, from = 0): number {
  let depth = 0;
  for (let index = from; index < text.length; index++) {
    const current = text[index];
    if (current === "{") {
      depth++;
    } else if (current === "}") {
      depth--;
    } else if (current === char && depth === 0) {
      return index;
    }
  }
  return -1;
}

/**
 * Splits on `separator` outside any braces.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let start = 0;
  let index = indexOfTopLevel(text, separator, start);
  while (index !== -1) {
    parts.push(text.slice(start, index));
    start = index + 1;
    index = indexOfTopLevel(text, separator, start);
  }
  parts.push(text.slice(start));
  return parts;
}

export function scanTemplate(template: string): Segment[] {
  const segments: Segment[] = [];
  let text = "";
  let index = 0;

  const flush = (): void => {
    if (text !== "") {
      segments.push({ kind: "text", text });
      text = "";
    }
  };

  while (index < template.length) {
    const char = template.charAt(index);
    const next = template.charAt(index + 1);

    if ((char === "{" && next === "{") || (char === "}" && next === "}")) {
      text += char;
      index += 2;
      continue;
    }

    if ((char === "$" || char === "#") && next === "{") {
      const end = findClosing(template, index + 1);
      const stop = end === -1 ? template.length : end + 1;
      text += template.slice(index, stop);
      index = stop;
      continue;
    }

    if (char === "{") {
      const end = findClosing(template, index);
      if (end === -1) {
        text += template.slice(index);
        break;
      }
      flush();
      segments.push({ kind: "marker", body: template.slice(index + 1, end) });
      index = end + 1;
      continue;
    }

    text += char;
    index++;
  }

  flush();
  return segments;
}

/**
 * Parses a marker body (the text between the outer braces).
 *
 * @example
 * ```typescript
 * parseMarker("?x:A{x}B");          // conditional on x
 * parseMarker("direction[left:-h]"); // lookup
 * parseMarker("name!");              // required value
 * ```
 */
export function parseMarker(body: string): Marker {
  if (body.startsWith("?")) {
    const rest = body.slice(1);
    const colon = indexOfTopLevel(rest, ":");
    return colon === -1
      ? { kind: "conditional", field: rest.trim() }
      : { kind: "conditional", field: rest.slice(0, colon).trim(), body: rest.slice(colon + 1) };
  }

  const bracket = indexOfTopLevel(body, "[");
  if (bracket !== -1 && body.endsWith("]")) {
    const { name, required } = parseName(body.slice(0, bracket));
    return { kind: "lookup", name, required, entries: parseEntries(body.slice(bracket + 1, -1)) };
  }

  return { kind: "value", ...parseName(body) };
}

function parseName(raw: string): { name: string; required: boolean } {
  const name = raw.trim();
  return name.endsWith("!") ? { name: name.slice(0, -1), required: true } : { name, required: false };
}

/**
 * Parses `k1:v1,k2:v2,default:v`. An entry without a colon maps to itself.
 */
export function parseEntries(table: string): LookupEntry[] {
  return splitTopLevel(table, ",")
    .filter((entry) => entry.trim() !== "")
    .map((entry) => {
      const colon = indexOfTopLevel(entry, ":");
      if (colon === -1) {
        const key = entry.trim();
        return { key, value: key };
      }
      return { key: entry.slice(0, colon).trim(), value: entry.slice(colon + 1).trim() };
    });
}

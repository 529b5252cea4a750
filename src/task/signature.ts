import { DefinitionError } from "../errors.js";

export type Parameter = {
  name: string;
  /** The callable supplies its own default for this parameter. */
  hasDefault: boolean;
};

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const SINGLE_ARROW = /^(?:async\s+)?([A-Za-z_$][A-Za-z0-9_$]*)\s*=>/;

/** Index of the bracket closing the one at `open`, skipping string literals. */
function matchingBracket(src: string, open: number): number {
  let depth = 0;
  let quote: string | undefined;
  for (let i = open; i < src.length; i++) {
    const ch = src[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === "'" || ch === '"' || ch === "`") quote = ch;
    else if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Split at commas (or the first `=`) that are not nested in brackets or strings. */
function splitTopLevel(src: string, separator: "," | "="): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let start = 0;
  for (let i = 0; i < src.length; i++) {
    const ch = src[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === "'" || ch === '"' || ch === "`") quote = ch;
    else if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth--;
    else if (ch === separator && depth === 0) {
      parts.push(src.slice(start, i));
      start = i + 1;
      if (separator === "=") break;
    }
  }
  parts.push(src.slice(start));
  return parts;
}

/**
 * Parameter list of a callable, read from its source text. Returns undefined
 * when a parameter is destructured and therefore has no single name.
 */
export function parameterNames(fn: Function): Parameter[] | undefined {
  const src = fn.toString().trim();
  if (src.startsWith("class")) {
    throw new DefinitionError("INVALID_DECLARATION", `Cannot read parameters of class "${fn.name}"`);
  }
  const single = SINGLE_ARROW.exec(src);
  if (single) {
    return [{ name: single[1], hasDefault: false }];
  }
  const open = src.indexOf("(");
  const close = open === -1 ? -1 : matchingBracket(src, open);
  if (close === -1) {
    throw new DefinitionError("INVALID_DECLARATION", `Cannot read parameters of "${fn.name || "anonymous function"}"`);
  }

  const params: Parameter[] = [];
  for (const raw of splitTopLevel(src.slice(open + 1, close), ",")) {
    const text = raw.trim();
    if (text === "") continue;
    if (text.startsWith("...")) {
      throw new DefinitionError(
        "INVALID_DECLARATION",
        `Rest parameter "${text}" of "${fn.name}" cannot be mapped to input fields`,
      );
    }
    const [head, ...rest] = splitTopLevel(text, "=");
    const name = head.trim();
    if (!IDENTIFIER.test(name)) return undefined;
    params.push({ name, hasDefault: rest.length > 0 });
  }
  return params;
}

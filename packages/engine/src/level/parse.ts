import { LevelDataSchema, LevelFormatError, type LevelData } from "./levelSchema.js";

/**
 * Level files are written by the game with trailing commas, which JSON.parse
 * rejects. Drop every comma whose next non-space character closes an object
 * or array, leaving string contents alone.
 */
export function stripTrailingCommas(text: string): string {
  let out = "";
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      out += ch;
      if (ch === "\\") {
        out += text[i + 1] ?? "";
        i++;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }
    if (ch === "\"") {
      inString = true;
      out += ch;
      continue;
    }
    if (ch === ",") {
      let j = i + 1;
      while (j < text.length && /\s/.test(text[j])) j++;
      if (text[j] === "}" || text[j] === "]") continue;
    }
    out += ch;
  }
  return out;
}

function formatIssuePath(path: (string | number)[]): string {
  if (path.length === 0) return "(root)";
  return path.map((part) => (typeof part === "number" ? `[${part}]` : `.${part}`)).join("").replace(/^\./, "");
}

export function parseLevelText(text: string): LevelData {
  const cleaned = stripTrailingCommas(text.replace(/^\uFEFF/, ""));
  let raw: unknown;
  try {
    raw = JSON.parse(cleaned);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LevelFormatError(`level is not valid JSON: ${message}`);
  }
  const parsed = LevelDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new LevelFormatError(`${issue.message} at path ${formatIssuePath(issue.path)}`);
  }
  return parsed.data;
}

export function serializeLevel(level: LevelData): string {
  return `${JSON.stringify(level, null, 2)}\n`;
}

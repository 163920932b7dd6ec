/**
 * Extraction of a single SQL statement from free-form model output.
 *
 * Strategies run in order and the first one that yields a statement wins,
 * from the most delimited candidate (a fenced ```sql block) down to the raw text.
 */

export type ExtractionStrategy = (text: string) => string | undefined;

const SQL_FENCE = /```sql\b[^\S\n]*\n?([\s\S]*?)```/gi;
const ANY_FENCE = /```([\s\S]*?)```/g;
const FENCE_INFO_LINE = /^[\w+#.-]+[^\S\n]*\n/;

const FENCED_KEYWORDS = ['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'WITH'];
const STATEMENT_START = /^(SELECT|WITH|INSERT|UPDATE|DELETE)\b/i;
const FALLBACK_KEYWORDS = ['SELECT', 'FROM', 'WHERE', 'JOIN'];

function stripInfoLine(body: string): string {
  const info = FENCE_INFO_LINE.exec(body);
  if (!info || STATEMENT_START.test(info[0])) return body;
  return body.slice(info[0].length);
}

function containsKeyword(text: string, keywords: readonly string[]): boolean {
  const upper = text.toUpperCase();
  return keywords.some((keyword) => upper.includes(keyword));
}

/**
 * Interior of the first non-empty code block tagged `sql` (any case).
 */
export function fromSqlFence(text: string): string | undefined {
  for (const match of text.matchAll(SQL_FENCE)) {
    const body = match[1].trim();
    if (body) return body;
  }
  return undefined;
}

/**
 * Interior of the first code block that mentions a statement keyword.
 * A language tag on the opening fence line (```postgresql, ```text) is dropped.
 */
export function fromAnyFence(text: string): string | undefined {
  for (const match of text.matchAll(ANY_FENCE)) {
    const body = stripInfoLine(match[1]).trim();
    if (body && containsKeyword(body, FENCED_KEYWORDS)) return body;
  }
  return undefined;
}

/**
 * Scan lines for a statement start and collect lines until a blank line or `;`.
 * Comment-only lines (`--`, `#`) inside the statement are skipped.
 */
export function fromLineScan(text: string): string | undefined {
  const collected: string[] = [];
  let inStatement = false;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();

    if (!inStatement) {
      if (!STATEMENT_START.test(line)) continue;
      inStatement = true;
    } else if (!line) {
      break;
    } else if (line.startsWith('--') || line.startsWith('#')) {
      continue;
    }

    collected.push(line);
    if (line.endsWith(';')) break;
  }

  return collected.length > 0 ? collected.join('\n') : undefined;
}

/**
 * The whole response, when it reads like SQL at all.
 */
export function fromRawText(text: string): string | undefined {
  const trimmed = text.trim();
  if (trimmed && containsKeyword(trimmed, FALLBACK_KEYWORDS)) return trimmed;
  return undefined;
}

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  fromSqlFence,
  fromAnyFence,
  fromLineScan,
  fromRawText,
];

/**
 * Best SQL candidate in a completion, or undefined when there is none.
 */
export function extractSql(rawText: string): string | undefined {
  for (const strategy of EXTRACTION_STRATEGIES) {
    const sql = strategy(rawText);
    if (sql !== undefined) return sql;
  }
  return undefined;
}

/**
 * Structural checks for rule match expressions
 *
 * This is not a full expression parser. It catches what breaks a deployment
 * before any call is made: blank expressions, unbalanced brackets and
 * unterminated string literals (plain "..." with backslash escapes, raw r"...").
 */

const OPENERS: Record<string, string> = { '(': ')', '{': '}' };
const CLOSERS = new Set([')', '}']);

interface ScanResult {
  problem: string | null;
  /** For each opening bracket index, the index of its closing bracket */
  pairs: Map<number, number>;
  /**
   * The expression with string literals blanked to `_` and everything inside
   * brackets blanked to spaces; offsets match the original
   */
  topLevel: string;
}

function scan(expression: string): ScanResult {
  const pairs = new Map<number, number>();
  const stack: Array<{ char: string; index: number }> = [];
  let topLevel = '';
  let i = 0;

  while (i < expression.length) {
    const char = expression[i];

    const raw = char === 'r' && expression[i + 1] === '"' && !/\w/.test(expression[i - 1] ?? '');
    if (char === '"' || raw) {
      const start = i;
      i += raw ? 2 : 1;
      let closed = false;
      while (i < expression.length) {
        const c = expression[i];
        if (!raw && c === '\\') {
          i += 2;
          continue;
        }
        if (c === '"') {
          closed = true;
          break;
        }
        i++;
      }
      if (!closed) {
        return { problem: `unterminated string literal at offset ${start}`, pairs, topLevel };
      }
      i++;
      topLevel += '_'.repeat(i - start);
      continue;
    }

    if (char in OPENERS) {
      topLevel += stack.length === 0 ? char : ' ';
      stack.push({ char, index: i });
    } else if (CLOSERS.has(char)) {
      const open = stack.pop();
      if (!open) {
        return { problem: `unexpected '${char}' at offset ${i}`, pairs, topLevel };
      }
      if (OPENERS[open.char] !== char) {
        return {
          problem: `'${open.char}' at offset ${open.index} closed by '${char}' at offset ${i}`,
          pairs,
          topLevel,
        };
      }
      pairs.set(open.index, i);
      topLevel += stack.length === 0 ? char : ' ';
    } else {
      topLevel += stack.length === 0 ? char : ' ';
    }
    i++;
  }

  const unclosed = stack.pop();
  if (unclosed) {
    return {
      problem: `unclosed '${unclosed.char}' at offset ${unclosed.index}`,
      pairs,
      topLevel,
    };
  }
  return { problem: null, pairs, topLevel };
}

/**
 * Returns a description of the first structural problem, or null when the
 * expression is well-formed.
 */
export function findExpressionProblem(expression: string): string | null {
  if (expression.trim().length === 0) return 'expression is empty';
  return scan(expression).problem;
}

function stripEnclosingParens(expression: string): string {
  let current = expression.trim();
  while (current.startsWith('(')) {
    const { problem, pairs } = scan(current);
    if (problem !== null || pairs.get(0) !== current.length - 1) break;
    current = current.slice(1, -1).trim();
  }
  return current;
}

function normalizeClause(clause: string): string {
  return stripEnclosingParens(clause).replace(/\s+/g, ' ');
}

const LOGICAL_OPERATOR = /\b(?:and|or|xor|not)\b|&&|\|\||\^\^|!(?!=)/;

/**
 * A single comparison, or anything wrapped whole in parentheses. `and` binds
 * tighter than `or`, so only such a clause can stand on either side of
 * `and not` without the operator reaching into it.
 */
function isSingleTerm(clause: string): boolean {
  const trimmed = clause.trim();
  if (trimmed.length === 0) return false;
  if (stripEnclosingParens(trimmed) !== trimmed) return true;
  return !LOGICAL_OPERATOR.test(scan(trimmed).topLevel);
}

/**
 * True only for a self-contradiction of the form `X and not X`, where each X
 * is a single comparison or a parenthesised group. Such an expression can
 * never match a request whatever X tests.
 */
export function neverMatches(expression: string): boolean {
  if (findExpressionProblem(expression) !== null) return false;
  const body = stripEnclosingParens(expression);
  const split = /\s+and\s+not\s+/.exec(scan(body).topLevel);
  if (!split) return false;

  const left = body.slice(0, split.index);
  const right = body.slice(split.index + split[0].length);
  if (!isSingleTerm(left) || !isSingleTerm(right)) return false;

  const lhs = normalizeClause(left);
  return lhs.length > 0 && lhs === normalizeClause(right);
}

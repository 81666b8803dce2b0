import { escapeRegex } from '../utils.js';

/** Directory names search and recursive listing never descend into. */
export const SKIP_DIRS = new Set(['node_modules', '.git']);

/** Very small glob matcher supporting exact, '*.ext' and a single '*' anywhere. */
export function globishMatch(name: string, glob: string): boolean {
  if (glob === name) return true;
  const m = /^\*\.(.+)$/.exec(glob);
  if (m) return name.endsWith('.' + m[1]);
  if (glob.includes('*')) {
    const re = new RegExp('^' + glob.split('*').map(escapeRegex).join('.*') + '$');
    return re.test(name);
  }
  return false;
}

/**
 * Compile a search pattern. An invalid regex is retried as a literal.
 */
export function compilePattern(
  pattern: string,
  caseSensitive: boolean
): { re: RegExp; literal: boolean } {
  const flags = caseSensitive ? '' : 'i';
  try {
    return { re: new RegExp(pattern, flags), literal: false };
  } catch {
    return { re: new RegExp(escapeRegex(pattern), flags), literal: true };
  }
}

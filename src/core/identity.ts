import { CoverageMapFormatError } from './errors';

/**
 * Names a function for matching: source path, canonical signature and the
 * 1-based line of its definition. Identities are values; a moved function
 * gets a new identity.
 */
export interface FunctionIdentity {
  readonly path: string;
  readonly signature: string;
  readonly startLine: number;
}

export function formatIdentityKey(id: FunctionIdentity): string {
  return `${id.path}:${id.signature}:${id.startLine}`;
}

/** Key for the pathless tier: path and signature, line dropped. */
export function pathSignatureKey(path: string, signature: string): string {
  return `${path}\u0000${signature}`;
}

/**
 * Splits `path:signature:line`. The path ends at the first colon and the line
 * starts after the last one; everything in between is the signature, which may
 * itself contain `::`.
 */
export function parseIdentityKey(key: string): FunctionIdentity {
  const first = key.indexOf(':');
  const last = key.lastIndexOf(':');
  if (first <= 0 || last <= first + 1) {
    throw new CoverageMapFormatError(`Malformed function key (expected path:signature:line): ${key}`);
  }
  const lineText = key.slice(last + 1);
  if (!/^\d+$/.test(lineText)) {
    throw new CoverageMapFormatError(`Malformed function key (line is not an integer): ${key}`);
  }
  const startLine = Number(lineText);
  if (startLine < 1) {
    throw new CoverageMapFormatError(`Malformed function key (line must be >= 1): ${key}`);
  }
  const signature = key.slice(first + 1, last);
  if (!signature.trim()) {
    throw new CoverageMapFormatError(`Malformed function key (empty signature): ${key}`);
  }
  return { path: key.slice(0, first), signature, startLine };
}

/** Cross-commit name of a function: qualified name plus parameter types, no line. */
export function stableKey(qualifiedName: string, parameterTypes: readonly string[]): string {
  return `${qualifiedName}(${parameterTypes.join(', ')})`;
}

/**
 * Qualified name portion of a demangled signature: the text before the
 * parameter list, without the return type that demangled template
 * instantiations carry (`int ns::f<int>(int)` -> `ns::f<int>`).
 */
export function signatureName(signature: string): string {
  let depth = 0;
  let open = -1;
  for (let i = 0; i < signature.length && open < 0; i++) {
    if (isOperatorAt(signature, i)) {
      let j = i + 'operator'.length;
      if (signature.startsWith('()', j)) j += 2;
      while (j < signature.length && signature[j] !== '(') j++;
      i = j - 1;
      continue;
    }
    const ch = signature[i];
    if (ch === '<') depth++;
    else if (ch === '>') depth = Math.max(0, depth - 1);
    else if (ch === '(' && depth === 0) open = i;
  }
  const head = (open >= 0 ? signature.slice(0, open) : signature).trim();

  const op = /(?:^|::|\s)operator\b/.exec(head);
  const scopeEnd = op ? op.index + op[0].length - 'operator'.length : head.length;
  const scope = head.slice(0, scopeEnd);
  let depthBack = 0;
  for (let i = scope.length - 1; i >= 0; i--) {
    const ch = scope[i];
    if (ch === '>') depthBack++;
    else if (ch === '<') depthBack--;
    else if (ch === ' ' && depthBack === 0) return head.slice(i + 1);
  }
  return head;
}

function isOperatorAt(text: string, i: number): boolean {
  if (!text.startsWith('operator', i)) return false;
  const prev = i === 0 ? '' : text[i - 1];
  const next = text[i + 'operator'.length] ?? '';
  return (prev === '' || prev === ':' || prev === ' ') && !/[A-Za-z0-9_]/.test(next);
}

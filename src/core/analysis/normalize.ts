import Parser from 'tree-sitter';
import Cpp from 'tree-sitter-cpp';

let parser: Parser | null = null;

function cppParser(): Parser {
  if (!parser) {
    parser = new Parser();
    parser.setLanguage(Cpp);
  }
  return parser;
}

function parseCpp(text: string): Parser.Tree {
  const p = cppParser();
  try {
    return p.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    if (!msg.includes('Invalid argument')) throw e;
    return p.parse(text, undefined, { bufferSize: 1024 * 1024 });
  }
}

function collectComments(n: Parser.SyntaxNode, out: Array<[number, number]>): void {
  if (n.type === 'comment') {
    out.push([n.startIndex, n.endIndex]);
    return;
  }
  for (let i = 0; i < n.childCount; i++) {
    const c = n.child(i);
    if (c) collectComments(c, out);
  }
}

function spliceOut(text: string, ranges: Array<[number, number]>): string {
  ranges.sort((a, b) => a[0] - b[0]);
  let out = '';
  let at = 0;
  for (const [start, end] of ranges) {
    if (start < at) continue;
    out += text.slice(at, start) + ' ';
    at = end;
  }
  return out + text.slice(at);
}

/** Comment removal that only knows about string and character literals. */
export function stripCommentsLexically(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];
    if (ch === '"' || ch === "'") {
      let j = i + 1;
      while (j < text.length && text[j] !== ch && text[j] !== '\n') j += text[j] === '\\' ? 2 : 1;
      out += text.slice(i, j + 1);
      i = j + 1;
    } else if (ch === '/' && next === '/') {
      let j = i + 2;
      // a backslash-newline continues a line comment
      while (j < text.length && !(text[j] === '\n' && text[j - 1] !== '\\')) j++;
      out += ' ';
      i = j;
    } else if (ch === '/' && next === '*') {
      const end = text.indexOf('*/', i + 2);
      out += ' ';
      i = end < 0 ? text.length : end + 2;
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

export function stripComments(text: string): string {
  let tree: Parser.Tree;
  try {
    tree = parseCpp(text);
  } catch {
    return stripCommentsLexically(text);
  }
  const ranges: Array<[number, number]> = [];
  collectComments(tree.rootNode, ranges);
  return ranges.length ? spliceOut(text, ranges) : text;
}

/**
 * Canonical form of a function body for move detection: comments gone,
 * every whitespace run collapsed to one space, ends trimmed.
 */
export function normalizeBody(text: string): string {
  return stripComments(text).replace(/\s+/g, ' ').trim();
}

/** Lines `start..end` (1-based, inclusive) of `text`. */
export function sliceLines(text: string, start: number, end: number): string {
  return text.split('\n').slice(Math.max(0, start - 1), Math.max(0, end)).join('\n');
}

import type { Code, Root } from 'mdast';
import type { Plugin } from 'unified';
import { visit } from 'unist-util-visit';

const OPENING_FENCE = /^[ \t]*(`{3,}|~{3,})/;
// Container markers a closing fence may sit behind (blockquotes, list indentation)
const CONTAINER_PREFIX = /^[ \t>]*/;

function isClosingFence(line: string, char: string, minLength: number): boolean {
  const fence = line.replace(CONTAINER_PREFIX, '').trimEnd();
  return fence.length >= minLength && [...fence].every(c => c === char);
}

// Remark plugin: fail the file when a fenced code block runs to the end of its
// container without a closing fence (CommonMark lets such a block run on).

const remarkFenceGuard: Plugin<[], Root> = () => (tree, file) => {
  const source = String(file);
  visit(tree, 'code', (node: Code) => {
    const start = node.position?.start.offset;
    const end = node.position?.end.offset;
    if (start === undefined || end === undefined) return;

    const lines = source.slice(start, end).split(/\r?\n/);
    const opening = OPENING_FENCE.exec(lines[0] ?? '');
    if (!opening) return; // indented code block

    const fence = opening[1];
    const last = lines[lines.length - 1];
    if (lines.length < 2 || last === undefined || !isClosingFence(last, fence[0], fence.length)) {
      file.fail(`Unterminated code fence: ${fence}${node.lang ?? ''} is never closed`, node);
    }
  });
};

export default remarkFenceGuard;

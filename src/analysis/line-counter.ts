import ts from "typescript";

import type { LineCounts } from "../core/types.js";

export type LineKind = "code" | "comment" | "blank";

/**
 * Classifies every line of `sourceFile`. A line is code when it holds any
 * non-whitespace character outside a comment, comment when it holds only
 * comment text, blank otherwise. Comment positions come from the parser, so
 * `//` inside strings or regular expressions is never mistaken for one.
 */
export function classifyLines(sourceFile: ts.SourceFile): LineKind[] {
  const text = sourceFile.text;
  if (text.length === 0) {
    return [];
  }

  const inComment = new Uint8Array(text.length);

  for (const range of collectCommentRanges(sourceFile)) {
    inComment.fill(1, range.pos, range.end);
  }

  const kinds: LineKind[] = [];
  let sawCode = false;
  let sawComment = false;

  for (let index = 0; index <= text.length; index += 1) {
    const char = text[index];
    if (char === undefined || char === "\n") {
      kinds.push(sawCode ? "code" : sawComment ? "comment" : "blank");
      sawCode = false;
      sawComment = false;
      continue;
    }

    if (/\s/.test(char)) continue;
    if (inComment[index] === 1) {
      sawComment = true;
    } else {
      sawCode = true;
    }
  }

  // A trailing newline does not open another line.
  if (text.endsWith("\n")) {
    kinds.pop();
  }

  return kinds;
}

/** Counts over the 1-based inclusive line range, or the whole file. */
export function summarizeLines(kinds: LineKind[], startLine = 1, endLine = kinds.length): LineCounts {
  const counts: LineCounts = { total: 0, code: 0, comment: 0, blank: 0 };
  for (let line = Math.max(1, startLine); line <= Math.min(endLine, kinds.length); line += 1) {
    const kind = kinds[line - 1];
    counts.total += 1;
    counts[kind] += 1;
  }
  return counts;
}

function collectCommentRanges(sourceFile: ts.SourceFile): ts.CommentRange[] {
  const text = sourceFile.text;
  const ranges = new Map<number, ts.CommentRange>();
  const stack: ts.Node[] = [sourceFile];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    for (const range of ts.getLeadingCommentRanges(text, node.pos) ?? []) {
      ranges.set(range.pos, range);
    }
    for (const range of ts.getTrailingCommentRanges(text, node.end) ?? []) {
      ranges.set(range.pos, range);
    }

    stack.push(...node.getChildren(sourceFile));
  }

  return [...ranges.values()];
}

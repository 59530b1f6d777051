/**
 * Normalisation of stray markdown symbols before classification.
 *
 * Outside fenced code:
 * - runs of 3+ `*`, `_`, `~` collapse to the doubled form
 * - runs of 4+ backticks collapse to a fence
 * - a line-leading run of 7+ `#` collapses to six
 * - an unpaired `**` on a line is removed (the last one)
 * - lines made only of `#`, `*`, `_`, `~` are dropped
 *
 * Horizontal rules are left alone. `cleanup(cleanup(s)) === cleanup(s)`.
 */

import { FENCE, isFenceLine, isHorizontalRule } from "./predicates";

const NOISE_LINE = /^\s*[#*_~][#*_~\s]*$/;

function collapseRuns(line: string): string {
  return line
    .replace(/\*{3,}/g, "**")
    .replace(/_{3,}/g, "__")
    .replace(/~{3,}/g, "~~")
    .replace(/`{4,}/g, FENCE)
    .replace(/^(\s*)#{7,}/, "$1######");
}

function dropUnpairedBold(line: string): string {
  const markers = line.match(/\*\*/g);
  if (!markers || markers.length % 2 === 0) {
    return line;
  }
  const last = line.lastIndexOf("**");
  return line.slice(0, last) + line.slice(last + 2);
}

function cleanupOnce(text: string): string {
  const out: string[] = [];
  let inFence = false;

  for (const line of text.split("\n")) {
    if (isFenceLine(line)) {
      out.push(line.replace(/`{4,}/g, FENCE));
      inFence = !inFence;
      continue;
    }
    if (inFence || isHorizontalRule(line)) {
      out.push(line);
      continue;
    }

    const collapsed = collapseRuns(line);
    if (NOISE_LINE.test(collapsed) && !isHorizontalRule(collapsed)) {
      continue;
    }
    out.push(dropUnpairedBold(collapsed));
  }

  return out.join("\n");
}

/**
 * Collapse excessive markdown symbols and drop symbol-only noise lines.
 * Applied until nothing changes, so a second call is a no-op.
 */
export function cleanup(text: string): string {
  let current = text;
  for (;;) {
    const next = cleanupOnce(current);
    if (next === current) return current;
    current = next;
  }
}

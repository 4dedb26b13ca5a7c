import type {Segment} from './interfaces';
import {visibleLength} from './kanji';
import {renderVariants} from './render';

export const DEFAULT_PREVIEW_CHARS = 200;

const VOID_TAGS = new Set(['br']);
const OPEN_TAG = /^<([a-zA-Z][a-zA-Z0-9]*)>$/;
const CLOSE_TAG = /^<\/([a-zA-Z][a-zA-Z0-9]*)>$/;

/**
 * Characters a segment costs against the preview budget. Markup is free.
 */
export function budgetOf(seg: Segment): number {
  if (seg.type === 'html') { return 0; }
  return visibleLength(seg.type === 'text' ? seg.content : seg.kanji);
}

function isOpeningTag(seg: Segment): boolean {
  if (seg.type !== 'html') { return false; }
  const opening = seg.content.match(OPEN_TAG);
  return !!opening && !VOID_TAGS.has(opening[1].toLowerCase());
}

/**
 * Longest prefix of `segments` costing at most `maxChars`. Text may be cut mid-segment; a kanji group is all or
 * nothing, and the prefix ends before the first group that doesn't fit even if budget is left over. When the cut
 * happens, opening tags with nothing after them are dropped so the preview doesn't end in an empty element.
 */
export function truncateSegments(segments: Segment[], maxChars: number): Segment[] {
  const budget = Math.max(0, maxChars);
  const ret: Segment[] = [];
  let used = 0;
  for (const seg of segments) {
    const cost = budgetOf(seg);
    if (used + cost <= budget) {
      ret.push(seg);
      used += cost;
      continue;
    }
    if (seg.type === 'text') {
      const head = Array.from(seg.content).slice(0, budget - used).join('');
      if (head) { ret.push({type: 'text', content: head}); }
    }
    while (ret.length > 0 && isOpeningTag(ret[ret.length - 1])) { ret.pop(); }
    break;
  }
  return ret;
}

/**
 * Append closing tags for structural elements a truncation left open, innermost first.
 */
export function closeOpenMarkup(segments: Segment[]): Segment[] {
  const open: string[] = [];
  for (const seg of segments) {
    if (seg.type !== 'html') { continue; }
    const opening = seg.content.match(OPEN_TAG);
    if (opening) {
      if (!VOID_TAGS.has(opening[1].toLowerCase())) { open.push(opening[1]); }
      continue;
    }
    const closing = seg.content.match(CLOSE_TAG);
    if (closing && open[open.length - 1] === closing[1]) { open.pop(); }
  }
  return segments.concat(open.reverse().map((tag): Segment => ({type: 'html', content: `</${tag}>`})));
}

export function previewHtml(segments: Segment[], maxChars: number = DEFAULT_PREVIEW_CHARS): string {
  return renderVariants(closeOpenMarkup(truncateSegments(segments, maxChars)));
}

import type {KanjiSegment, Segment} from './interfaces';

export const VARIANT_CLASSES = {
  all: 'known-version',
  unknownOnly: 'unknown-version',
  none: 'no-furigana-version',
} as const;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function rubyHtml(seg: KanjiSegment): string {
  const attrs = seg.classification.tag === 'level' ? ` data-level="${seg.classification.level}"` : '';
  return `<ruby${attrs}>${escapeHtml(seg.kanji)}<rt>${escapeHtml(seg.reading)}</rt></ruby>`;
}

/**
 * Whether the default view (furigana for unknown kanji only) annotates this group.
 */
export function needsReading(seg: KanjiSegment): boolean {
  return seg.classification.tag === 'unknown' || seg.classification.tag === 'unleveled';
}

/**
 * All three views in one fragment, so the page switches between them with CSS alone:
 *
 * ```html
 * <span class="known-version">…every group in ruby…</span>
 * <span class="unknown-version">…only unknown/unleveled groups in ruby…</span>
 * <span class="no-furigana-version">…bare kanji…</span>
 * ```
 *
 * Markup segments are emitted verbatim, text is escaped. Groups without a reading (synthesis failed) stay bare
 * everywhere rather than showing an empty `<rt>`.
 */
export function renderVariants(segments: Segment[]): string {
  const all: string[] = [];
  const unknownOnly: string[] = [];
  const none: string[] = [];

  for (const seg of segments) {
    if (seg.type === 'html') {
      all.push(seg.content);
      unknownOnly.push(seg.content);
      none.push(seg.content);
      continue;
    }
    if (seg.type === 'text') {
      const text = escapeHtml(seg.content);
      all.push(text);
      unknownOnly.push(text);
      none.push(text);
      continue;
    }
    const bare = escapeHtml(seg.kanji);
    const ruby = seg.reading ? rubyHtml(seg) : bare;
    all.push(ruby);
    unknownOnly.push(needsReading(seg) ? ruby : bare);
    none.push(bare);
  }

  return `<span class="${VARIANT_CLASSES.all}">${all.join('')}</span>` +
         `<span class="${VARIANT_CLASSES.unknownOnly}">${unknownOnly.join('')}</span>` +
         `<span class="${VARIANT_CLASSES.none}">${none.join('')}</span>`;
}

/**
 * The segments with readings dropped: the text a reader sees plus structural tags. Inverse of segmentation.
 */
export function reconstruct(segments: Segment[]): string {
  return segments.map(seg => seg.type === 'kanji' ? seg.kanji : seg.content).join('');
}

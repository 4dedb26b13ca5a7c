// CJK Unified Ideographs, U+4E00 through U+9FAF inclusive
const KANJI_FIRST = 0x4e00;
const KANJI_LAST = 0x9faf;

export function isKanji(char: string): boolean {
  const cp = char.codePointAt(0);
  return char.length === 1 && cp !== undefined && cp >= KANJI_FIRST && cp <= KANJI_LAST;
}

export function hasKanji(s: string): boolean { return kanjiIn(s).length > 0; }

/**
 * The kanji characters of `s`, in order, duplicates kept.
 */
export function kanjiIn(s: string): string[] { return Array.from(s).filter(isKanji); }

export interface KanjiRun {
  run: string;
  /** UTF-16 offset of the run's first character in the scanned string */
  start: number;
  end: number;
}

/**
 * Maximal runs of consecutive kanji. `text.slice(start, end) === run` for every element.
 */
export function kanjiRuns(text: string): KanjiRun[] {
  const runs: KanjiRun[] = [];
  let start = -1;
  for (let i = 0; i <= text.length; i++) {
    const inside = i < text.length && isKanji(text[i]);
    if (inside && start < 0) {
      start = i;
    } else if (!inside && start >= 0) {
      runs.push({run: text.slice(start, i), start, end: i});
      start = -1;
    }
  }
  return runs;
}

/**
 * Number of code points, i.e., what a reader would count as characters. This is the unit of the preview budget.
 */
export function visibleLength(s: string): number { return Array.from(s).length; }

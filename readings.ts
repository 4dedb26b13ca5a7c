import {createLogger, Logger} from './logger';

/**
 * Anything that can turn text into a hiragana reading. Backends may throw; `TransliteratedReadings` contains that.
 */
export interface ReadingBackend {
  readonly name: string;
  toHiragana(text: string): string;
}

/**
 * Gives a phonetic reading for one maximal run of kanji. Readings already present in ruby markup never go through
 * here: the segmenter carries those straight from `<rt>`.
 */
export interface ReadingSource {
  readingFor(kanjiRun: string): string;
}

export class InvalidKanjiRunError extends Error {
  constructor() {
    super('reading requested for an empty kanji run');
    this.name = 'InvalidKanjiRunError';
  }
}

function assertRun(kanjiRun: string): void {
  if (kanjiRun.length === 0) { throw new InvalidKanjiRunError(); }
}

/**
 * For runs where nothing can supply a reading. Groups built with it render without furigana in every variant.
 */
export class NoReadings implements ReadingSource {
  readingFor(kanjiRun: string): string {
    assertRun(kanjiRun);
    return '';
  }
}

export class TransliteratedReadings implements ReadingSource {
  private readonly memo: Map<string, string> = new Map();

  constructor(private readonly backend: ReadingBackend, private readonly log: Logger = createLogger('Readings')) {}

  /**
   * Backend failures give the empty reading and a logged error. Results, failures included, are memoised per run so
   * an article that repeats a word pays for it once.
   */
  readingFor(kanjiRun: string): string {
    assertRun(kanjiRun);
    const hit = this.memo.get(kanjiRun);
    if (hit !== undefined) { return hit; }

    let reading = '';
    try {
      reading = this.backend.toHiragana(kanjiRun);
    } catch (e) {
      this.log.error(`${this.backend.name} failed to read ${kanjiRun}:`, e instanceof Error ? e.message : e);
    }
    this.memo.set(kanjiRun, reading);
    return reading;
  }
}

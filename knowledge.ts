import {isRight} from 'fp-ts/lib/Either';
import {existsSync, mkdirSync, readFileSync, writeFileSync} from 'fs';
import * as t from 'io-ts';
import {PathReporter} from 'io-ts/lib/PathReporter';
import path from 'path';

import {Classification, LearnedKanjiFile, TKanjiLevelsFile, TLearnedKanjiFile} from './interfaces';
import {kanjiIn} from './kanji';
import {createLogger, Logger} from './logger';

const defaultLog = createLogger('Knowledge');

/**
 * Decides, per kanji, whether the reader needs furigana. Implementations are immutable once built.
 */
export interface KnowledgePolicy {
  readonly kind: 'binary'|'leveled';
  classify(char: string): Classification;
  /**
   * Classification of a whole kanji group. Only the group's kanji count: kana inside a ruby base is ignored.
   */
  classifyGroup(text: string): Classification;
}

/**
 * Read and validate a JSON reference file. Missing and malformed files both come back as `undefined` with a warning:
 * a run without reference data is degraded, not failed.
 */
function readReferenceFile<A>(file: string, codec: t.Decoder<unknown, A>, log: Logger): A|undefined {
  if (!existsSync(file)) {
    log.warn(`${file} not found, continuing without reference data`);
    return undefined;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (e) {
    log.warn(`${file} is not valid JSON, ignoring it:`, e instanceof Error ? e.message : e);
    return undefined;
  }
  const decoded = codec.decode(raw);
  if (!isRight(decoded)) {
    log.warn(`${file} has unexpected shape, ignoring it:`, PathReporter.report(decoded).join('; '));
    return undefined;
  }
  return decoded.right;
}

export class LearnedKanji implements KnowledgePolicy {
  readonly kind = 'binary';
  private readonly learned: ReadonlySet<string>;

  constructor(kanji: Iterable<string> = []) { this.learned = new Set(kanji); }

  static fromFile(file: string, log: Logger = defaultLog): LearnedKanji {
    const data = readReferenceFile(file, TLearnedKanjiFile, log);
    return new LearnedKanji(data ? data.kanji : []);
  }

  get size(): number { return this.learned.size; }

  has(char: string): boolean { return this.learned.has(char); }

  classify(char: string): Classification { return this.learned.has(char) ? {tag: 'known'} : {tag: 'unknown'}; }

  classifyGroup(text: string): Classification {
    return kanjiIn(text).every(k => this.learned.has(k)) ? {tag: 'known'} : {tag: 'unknown'};
  }

  /**
   * Write the set in the same format `fromFile` reads, stamped with `now`.
   */
  save(file: string, now: Date = new Date()): void {
    const kanji = Array.from(this.learned).sort();
    const data: LearnedKanjiFile = {updated_at: now.toISOString(), kanji_count: kanji.length, kanji};
    mkdirSync(path.dirname(file), {recursive: true});
    writeFileSync(file, JSON.stringify(data, null, 2));
  }
}

export class KanjiLevels implements KnowledgePolicy {
  readonly kind = 'leveled';
  private readonly kanjiToLevel: ReadonlyMap<string, number>;
  private readonly kanjiByLevel: ReadonlyMap<number, readonly string[]>;

  constructor(levels: Iterable<[string, number]> = []) {
    const toLevel: Map<string, number> = new Map();
    const byLevel: Map<number, string[]> = new Map();
    for (const [kanji, level] of levels) {
      toLevel.set(kanji, level);
      const list = byLevel.get(level);
      if (list) {
        list.push(kanji);
      } else {
        byLevel.set(level, [kanji]);
      }
    }
    this.kanjiToLevel = toLevel;
    this.kanjiByLevel = byLevel;
  }

  /**
   * Expects `{"字": {"wk_level": 3}, ...}`; entries whose level is missing or null are skipped.
   */
  static fromFile(file: string, log: Logger = defaultLog): KanjiLevels {
    const data = readReferenceFile(file, TKanjiLevelsFile, log);
    if (!data) { return new KanjiLevels(); }
    const pairs: [string, number][] = [];
    for (const [kanji, info] of Object.entries(data)) {
      if (typeof info.wk_level === 'number') { pairs.push([kanji, info.wk_level]); }
    }
    return new KanjiLevels(pairs);
  }

  get size(): number { return this.kanjiToLevel.size; }

  levelFor(char: string): number|undefined { return this.kanjiToLevel.get(char); }

  kanjiForLevel(level: number): string[] { return [...(this.kanjiByLevel.get(level) ?? [])]; }

  kanjiUpToLevel(level: number): Set<string> {
    const ret: Set<string> = new Set();
    for (let lvl = 1; lvl <= level; lvl++) {
      for (const k of this.kanjiByLevel.get(lvl) ?? []) { ret.add(k); }
    }
    return ret;
  }

  /**
   * A binary policy for a reader who has finished every level up to and including `level`.
   */
  learnedUpToLevel(level: number): LearnedKanji { return new LearnedKanji(this.kanjiUpToLevel(level)); }

  classify(char: string): Classification {
    const level = this.kanjiToLevel.get(char);
    return level === undefined ? {tag: 'unleveled'} : {tag: 'level', level};
  }

  classifyGroup(text: string): Classification {
    // the hardest kanji decides; one kanji missing from the table means the reading always shows
    let max = 0;
    for (const k of kanjiIn(text)) {
      const level = this.kanjiToLevel.get(k);
      if (level === undefined) { return {tag: 'unleveled'}; }
      max = Math.max(max, level);
    }
    return {tag: 'level', level: max};
  }

  /**
   * Browser script declaring `KANJI_BY_LEVEL` and `KANJI_TO_LEVEL`, so pages can threshold on `data-level` without
   * fetching the table separately.
   */
  toScript(): string {
    const byLevel: Record<string, string[]> = {};
    for (const level of [...this.kanjiByLevel.keys()].sort((a, b) => a - b)) {
      byLevel[level] = this.kanjiForLevel(level);
    }
    const toLevel: Record<string, number> = Object.fromEntries(this.kanjiToLevel);
    return `const KANJI_BY_LEVEL = ${JSON.stringify(byLevel, null, 2)};\n\n` +
           `const KANJI_TO_LEVEL = ${JSON.stringify(toLevel)};\n`;
  }
}

export type AnyPolicy = LearnedKanji|KanjiLevels;

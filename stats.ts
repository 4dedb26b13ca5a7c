import type {BinaryStats, LevelBucket, LeveledStats, Segment, TextStats} from './interfaces';
import {kanjiIn} from './kanji';
import type {AnyPolicy, KanjiLevels, LearnedKanji} from './knowledge';

const sortedUnique = (s: Set<string>) => Array.from(s).sort();

function kanjiOfSegments(segments: Segment[]): string[] {
  const ret: string[] = [];
  for (const seg of segments) {
    if (seg.type === 'kanji') { ret.push(...kanjiIn(seg.kanji)); }
  }
  return ret;
}

export function binaryStats(segments: Segment[], policy: LearnedKanji): BinaryStats {
  const known: Set<string> = new Set();
  const unknown: Set<string> = new Set();
  let knownCount = 0;
  let unknownCount = 0;
  const all = kanjiOfSegments(segments);
  for (const k of all) {
    if (policy.has(k)) {
      knownCount++;
      known.add(k);
    } else {
      unknownCount++;
      unknown.add(k);
    }
  }
  return {
    total_kanji: all.length,
    known_kanji: knownCount,
    unknown_kanji: unknownCount,
    unique_known_kanji: sortedUnique(known),
    unique_unknown_kanji: sortedUnique(unknown),
  };
}

export function leveledStats(segments: Segment[], policy: KanjiLevels): LeveledStats {
  const counts: Map<number, {count: number, unique: Set<string>}> = new Map();
  const unleveled = {count: 0, unique: new Set<string>()};
  const all = kanjiOfSegments(segments);
  for (const k of all) {
    const level = policy.levelFor(k);
    let bucket = unleveled;
    if (level !== undefined) {
      const hit = counts.get(level);
      bucket = hit ?? {count: 0, unique: new Set()};
      if (!hit) { counts.set(level, bucket); }
    }
    bucket.count++;
    bucket.unique.add(k);
  }
  const levels: Record<string, LevelBucket> = {};
  for (const [level, {count, unique}] of [...counts.entries()].sort((a, b) => a[0] - b[0])) {
    levels[level] = {count, unique: sortedUnique(unique)};
  }
  return {total_kanji: all.length, levels, unleveled: {count: unleveled.count, unique: sortedUnique(unleveled.unique)}};
}

/**
 * Per-character kanji counts. A three-kanji group adds three; only characters in the kanji block count, so kana in a
 * ruby base doesn't.
 */
export function textStats(segments: Segment[], policy: AnyPolicy): TextStats {
  return policy.kind === 'binary' ? binaryStats(segments, policy) : leveledStats(segments, policy);
}

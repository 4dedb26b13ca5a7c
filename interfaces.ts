import * as t from 'io-ts';

export type Classification = {tag: 'known'}|{tag: 'unknown'}|{tag: 'level', level: number}|{tag: 'unleveled'};

export interface TextSegment {
  type: 'text';
  content: string;
}
/**
 * A start, end, or self-closing tag (`<p>`, `</p>`, `<br>`) carried through verbatim
 */
export interface MarkupSegment {
  type: 'html';
  content: string;
}
export interface KanjiSegment {
  type: 'kanji';
  kanji: string;
  reading: string;
  classification: Classification;
}
export type Segment = TextSegment|MarkupSegment|KanjiSegment;

export interface BinaryStats {
  total_kanji: number;
  known_kanji: number;
  unknown_kanji: number;
  unique_known_kanji: string[];
  unique_unknown_kanji: string[];
}
export interface LevelBucket {
  count: number;
  unique: string[];
}
export interface LeveledStats {
  total_kanji: number;
  levels: Record<string, LevelBucket>;
  unleveled: LevelBucket;
}
export type TextStats = BinaryStats|LeveledStats;

export const TArticle = t.intersection([
  t.type({title: t.string, url: t.string}),
  t.partial({
    title_with_ruby: t.union([t.string, t.null]),
    content: t.union([t.string, t.null]),
    raw_html: t.union([t.string, t.null]),
    date: t.union([t.string, t.null]),
  }),
]);
export type Article = t.TypeOf<typeof TArticle>;
export const TArticles = t.array(TArticle);

export interface ProcessedArticle extends Article {
  title_segments?: Segment[];
  title_html?: string;
  content_segments?: Segment[];
  content_html?: string;
  content_preview_html?: string;
  stats?: TextStats;
}

// Reference data files
export const TLearnedKanjiFile = t.intersection([
  t.type({kanji: t.array(t.string)}),
  t.partial({updated_at: t.string, kanji_count: t.number}),
]);
export type LearnedKanjiFile = t.TypeOf<typeof TLearnedKanjiFile>;
export const TKanjiLevelsFile = t.record(t.string, t.partial({wk_level: t.union([t.number, t.null])}));

// Annotation server payloads
export const v1ReqText = t.intersection([t.type({text: t.string}), t.partial({previewChars: t.number})]);
export const v1ReqArticle = t.type({article: TArticle});
export interface v1ResText {
  segments: Segment[];
  html: string;
  previewHtml: string;
  stats: TextStats;
}

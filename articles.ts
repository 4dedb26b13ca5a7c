import {parse} from 'node-html-parser';

import {Config, DEFAULTS} from './config';
import type {Article, ProcessedArticle, Segment, v1ResText} from './interfaces';
import {AnyPolicy, KanjiLevels, LearnedKanji} from './knowledge';
import {kuromojiBackend} from './kuromojiBackend';
import {createLogger, Logger} from './logger';
import {previewHtml} from './preview';
import {NoReadings, ReadingSource, TransliteratedReadings} from './readings';
import {renderVariants} from './render';
import {Segmenter} from './segmenter';
import {textStats} from './stats';

export interface AnnotatorOptions {
  policy: AnyPolicy;
  readings?: ReadingSource;
  previewChars?: number;
  /** CSS selector for the article body inside `raw_html` */
  bodySelector?: string;
  log?: Logger;
}

export class ArticleAnnotator {
  readonly policy: AnyPolicy;
  readonly segmenter: Segmenter;
  private readonly previewChars: number;
  private readonly bodySelector: string;
  private readonly log: Logger;

  constructor({policy, readings, previewChars = DEFAULTS.previewChars, bodySelector = DEFAULTS.articleBodySelector,
               log = createLogger('Articles')}: AnnotatorOptions) {
    this.policy = policy;
    this.segmenter = new Segmenter({policy, readings, log});
    this.previewChars = previewChars;
    this.bodySelector = bodySelector;
    this.log = log;
  }

  annotateSegments(segments: Segment[], previewChars = this.previewChars): v1ResText {
    return {
      segments,
      html: renderVariants(segments),
      previewHtml: previewHtml(segments, previewChars),
      stats: textStats(segments, this.policy),
    };
  }

  annotateText(text: string, previewChars = this.previewChars): v1ResText {
    return this.annotateSegments(this.segmenter.segment(text), previewChars);
  }

  /**
   * A copy of `article` with segments, the three-variant HTML, a preview, and kanji stats added. The title comes from
   * `title_with_ruby` when present. The body comes from the `bodySelector` element of `raw_html` when there is
   * `raw_html`, otherwise from `content`.
   */
  processArticle(article: Article): ProcessedArticle {
    const processed: ProcessedArticle = {...article};

    const titleSource = article.title_with_ruby || article.title;
    if (titleSource) {
      const titleSegments = this.segmenter.segment(titleSource);
      processed.title_segments = titleSegments;
      processed.title_html = renderVariants(titleSegments);
    }

    let contentSegments: Segment[]|undefined;
    if (article.raw_html) {
      const body = parse(article.raw_html).querySelector(this.bodySelector);
      if (body) {
        contentSegments = this.segmenter.segmentElement(body);
      } else {
        this.log.warn(`no ${this.bodySelector} in raw_html of ${article.url}`);
      }
    } else if (article.content) {
      contentSegments = this.segmenter.segment(article.content);
    }

    if (contentSegments) {
      const annotated = this.annotateSegments(contentSegments);
      processed.content_segments = contentSegments;
      processed.content_html = annotated.html;
      processed.content_preview_html = annotated.previewHtml;
      processed.stats = annotated.stats;
    }
    return processed;
  }

  /**
   * One bad article is logged and left out; it never stops the rest of the backlog.
   */
  processArticles(articles: Article[]): ProcessedArticle[] {
    const ret: ProcessedArticle[] = [];
    for (const [i, article] of articles.entries()) {
      this.log.info(`processing article ${i + 1}/${articles.length}: ${article.title.slice(0, 50)}`);
      try {
        const processed = this.processArticle(article);
        ret.push(processed);
        const stats = processed.stats;
        if (stats && 'known_kanji' in stats) {
          this.log.info(`  漢字: ${stats.total_kanji}, 未習: ${stats.unknown_kanji}, 既習: ${stats.known_kanji}`);
        } else if (stats) {
          this.log.info(`  漢字: ${stats.total_kanji}, 級外: ${stats.unleveled.count}`);
        }
      } catch (e) {
        this.log.error(`failed to process ${article.url}:`, e instanceof Error ? e.message : e);
      }
    }
    return ret;
  }
}

export function policyFromConfig(config: Config, log?: Logger): AnyPolicy {
  if (config.policy === 'leveled') {
    if (!config.kanjiLevelsFile) {
      log?.warn('KNOWLEDGE_POLICY=leveled without KANJI_LEVELS_FILE, every kanji is unleveled');
      return new KanjiLevels();
    }
    return KanjiLevels.fromFile(config.kanjiLevelsFile, log);
  }
  return LearnedKanji.fromFile(config.knownKanjiFile, log);
}

/**
 * A kuromoji tokenizer that fails to build degrades to no readings for plain text; ruby markup still works.
 */
export async function readingsFromConfig(config: Config, log: Logger = createLogger('Readings')):
    Promise<ReadingSource> {
  if (config.readingBackend === 'none') { return new NoReadings(); }
  try {
    return new TransliteratedReadings(await kuromojiBackend(config.kuromojiDict), log);
  } catch (e) {
    log.error('could not load kuromoji, plain text will get no readings:', e instanceof Error ? e.message : e);
    return new NoReadings();
  }
}

export async function annotatorFromConfig(config: Config, log?: Logger): Promise<ArticleAnnotator> {
  const policy = policyFromConfig(config, log);
  const readings = await readingsFromConfig(config, log);
  return new ArticleAnnotator(
      {policy, readings, previewChars: config.previewChars, bodySelector: config.articleBodySelector, log});
}

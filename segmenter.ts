import {HTMLElement, parse, TextNode} from 'node-html-parser';

import type {KanjiSegment, Segment} from './interfaces';
import {kanjiRuns} from './kanji';
import type {KnowledgePolicy} from './knowledge';
import {createLogger, Logger} from './logger';
import {NoReadings, ReadingSource} from './readings';

// elements whose tags survive into every variant; all others are flattened into their children
const PRESERVED_TAGS = new Set(['p', 'div', 'br']);
const SELF_CLOSING = new Set(['br']);
// sentence-terminal punctuation and newlines; the capture group keeps them in `split`'s output
const CHUNK_SPLIT = /([。！？!?\n])/;
const HAS_TAG = /<\/?[a-zA-Z][^>]*>/;

export interface SegmenterOptions {
  policy: KnowledgePolicy;
  /** Supplies readings for kanji in plain text. Markup mode reads them from `<rt>` instead. */
  readings?: ReadingSource;
  log?: Logger;
}

export function looksLikeMarkup(input: string): boolean { return HAS_TAG.test(input); }

const tagOf = (el: HTMLElement) => (el.rawTagName || '').toLowerCase();

export class Segmenter {
  readonly policy: KnowledgePolicy;
  private readonly readings: ReadingSource;
  private readonly log: Logger;

  constructor({policy, readings = new NoReadings(), log = createLogger('Segmenter')}: SegmenterOptions) {
    this.policy = policy;
    this.readings = readings;
    this.log = log;
  }

  /**
   * Markup mode if `input` contains any HTML tag, plain-text mode otherwise.
   */
  segment(input: string): Segment[] {
    if (!input) { return []; }
    return looksLikeMarkup(input) ? this.segmentMarkup(input) : this.segmentPlainText(input);
  }

  segmentMarkup(html: string): Segment[] {
    if (!html) { return []; }
    return this.segmentNodes(parse(html).childNodes);
  }

  /**
   * Segment an element that's already been parsed, e.g., an article body picked out with a selector. The element
   * itself is walked, so a `<div>` container still yields its `<div>`/`</div>` pair.
   */
  segmentElement(el: HTMLElement): Segment[] { return this.segmentNodes([el]); }

  segmentPlainText(text: string): Segment[] {
    const segments: Segment[] = [];
    for (const chunk of text.split(CHUNK_SPLIT)) {
      if (!chunk) { continue; }
      let last = 0;
      for (const {run, start, end} of kanjiRuns(chunk)) {
        if (start > last) { segments.push({type: 'text', content: chunk.slice(last, start)}); }
        segments.push(this.kanjiSegment(run, this.readings.readingFor(run)));
        last = end;
      }
      if (last < chunk.length) { segments.push({type: 'text', content: chunk.slice(last)}); }
    }
    return segments;
  }

  private kanjiSegment(kanji: string, reading: string): KanjiSegment {
    return {type: 'kanji', kanji, reading, classification: this.policy.classifyGroup(kanji)};
  }

  private segmentNodes(nodes: readonly unknown[]): Segment[] {
    const segments: Segment[] = [];
    const visit = (node: unknown): void => {
      if (node instanceof TextNode) {
        const content = node.text;
        if (content) { segments.push({type: 'text', content}); }
        return;
      }
      // comments and anything else that isn't an element carry no visible text
      if (!(node instanceof HTMLElement)) { return; }

      const tag = tagOf(node);
      if (tag === 'ruby') {
        const seg = this.rubySegment(node);
        if (seg) { segments.push(seg); }
      } else if (PRESERVED_TAGS.has(tag)) {
        if (SELF_CLOSING.has(tag)) {
          segments.push({type: 'html', content: `<${tag}>`});
          return;
        }
        segments.push({type: 'html', content: `<${tag}>`});
        node.childNodes.forEach(visit);
        segments.push({type: 'html', content: `</${tag}>`});
      } else {
        node.childNodes.forEach(visit);
      }
    };
    nodes.forEach(visit);
    return segments;
  }

  /**
   * `<ruby>去年<rt>きょねん</rt></ruby>`: reading from `<rt>`, base from the text of every other child, so `<rb>` and
   * inline wrappers like `<b>漢</b>字` both count. `<rp>` fallback parentheses are skipped. A ruby lacking either half
   * is dropped without complaint.
   */
  private rubySegment(ruby: HTMLElement): KanjiSegment|undefined {
    let kanji = '';
    let reading = '';
    for (const child of ruby.childNodes) {
      if (child instanceof TextNode) {
        kanji += child.text;
      } else if (child instanceof HTMLElement) {
        const tag = tagOf(child);
        if (tag === 'rt') {
          reading += child.text;
        } else if (tag !== 'rp') {
          kanji += child.text;
        }
      }
    }
    if (!kanji || !reading) {
      this.log.debug('dropping incomplete ruby', ruby.toString());
      return undefined;
    }
    return this.kanjiSegment(kanji, reading);
  }
}

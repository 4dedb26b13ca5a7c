import * as kuromoji from 'kuromoji';
import path from 'path';

import {kata2hira} from './kana';
import {hasKanji} from './kanji';
import {createLogger} from './logger';
import type {ReadingBackend} from './readings';

const log = createLogger('Kuromoji');

// the part of kuromoji's `IpadicFeatures` a reading needs
interface Token {
  surface_form: string;
  reading?: string;
}

/**
 * Hiragana reading of `text` from its tokens. A token the dictionary can't read keeps its surface; if that leaves a
 * kanji in the result there is no reading, and this throws.
 */
export function readingFromTokens(text: string, tokens: Token[]): string {
  const reading = tokens.map(tok => tok.reading ? kata2hira(tok.reading) : tok.surface_form).join('');
  if (hasKanji(reading)) { throw new Error(`no kana reading for ${text}`); }
  return reading;
}

export function defaultDictionaryPath(): string {
  return path.resolve(path.dirname(require.resolve('kuromoji')), '..', 'dict') + path.sep;
}

/**
 * Build kuromoji's tokenizer (a few hundred milliseconds of dictionary loading, so once per run) and wrap it as a
 * reading backend. The IPA dictionary gives katakana readings, converted to hiragana here.
 */
export function kuromojiBackend(dicPath: string = defaultDictionaryPath()): Promise<ReadingBackend> {
  return new Promise((resolve, reject) => {
    log.info('loading dictionary from', dicPath);
    kuromoji.builder({dicPath}).build((err, tokenizer) => {
      if (err) {
        reject(err);
        return;
      }
      resolve({
        name: 'kuromoji',
        toHiragana(text: string): string { return readingFromTokens(text, tokenizer.tokenize(text)); },
      });
    });
  });
}

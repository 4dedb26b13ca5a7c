#!/usr/bin/env node
import dotenv from 'dotenv';
import {isRight} from 'fp-ts/lib/Either';
import {readFile, writeFile} from 'fs/promises';
import getStdin from 'get-stdin';
import {PathReporter} from 'io-ts/lib/PathReporter';

import {annotatorFromConfig} from './articles';
import {loadConfig} from './config';
import {TArticles} from './interfaces';
import {createLogger, setVerbose} from './logger';

export * from './interfaces';
export {ArticleAnnotator, annotatorFromConfig, policyFromConfig, readingsFromConfig} from './articles';
export type {Config} from './config';
export {loadConfig} from './config';
export {hasKanji, isKanji, kanjiIn, kanjiRuns, visibleLength} from './kanji';
export type {AnyPolicy, KnowledgePolicy} from './knowledge';
export {KanjiLevels, LearnedKanji} from './knowledge';
export {kuromojiBackend} from './kuromojiBackend';
export type {Logger} from './logger';
export {createLogger, setVerbose} from './logger';
export {closeOpenMarkup, previewHtml, truncateSegments} from './preview';
export type {ReadingBackend, ReadingSource} from './readings';
export {InvalidKanjiRunError, NoReadings, TransliteratedReadings} from './readings';
export {escapeHtml, reconstruct, renderVariants, rubyHtml} from './render';
export type {SegmenterOptions} from './segmenter';
export {Segmenter} from './segmenter';
export {binaryStats, leveledStats, textStats} from './stats';

const USAGE = `USAGE 1:
$ furigana-news [articles.json]

USAGE 2:
$ cat [articles.json] | furigana-news

Reads a JSON array of articles ({title, url, title_with_ruby?, raw_html?, content?, date?}) and prints them with
furigana segments, HTML, previews, and kanji stats added. Set OUTPUT_FILE to write to a file instead.`;

if (require.main === module) {
  dotenv.config();
  const config = loadConfig();
  setVerbose(config.verbose);
  const log = createLogger('Main');
  (async function main() {
    const text: string = process.argv[2] ? await readFile(process.argv[2], 'utf8') : await getStdin();
    if (!text.trim()) {
      console.error(USAGE);
      process.exit(1);
    }
    const articles = TArticles.decode(JSON.parse(text));
    if (!isRight(articles)) {
      log.error('input is not an array of articles:', PathReporter.report(articles).join('; '));
      process.exit(1);
    }

    const annotator = await annotatorFromConfig(config, log);
    const processed = annotator.processArticles(articles.right);
    log.info(`processed ${processed.length} of ${articles.right.length} articles`);

    const json = JSON.stringify(processed, null, 2);
    if (config.outputFile) {
      await writeFile(config.outputFile, json);
    } else {
      process.stdout.write(json + '\n');
    }
    if (config.levelsScriptFile && annotator.policy.kind === 'leveled') {
      await writeFile(config.levelsScriptFile, annotator.policy.toScript());
      log.info('wrote level table script to', config.levelsScriptFile);
    }
  })().catch(e => {
    log.error(e instanceof Error ? e.message : e);
    process.exit(1);
  });
}

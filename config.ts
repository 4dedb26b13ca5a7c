import {isRight} from 'fp-ts/lib/Either';
import * as t from 'io-ts';

import {createLogger, Logger} from './logger';
import {DEFAULT_PREVIEW_CHARS} from './preview';

const TPolicyKind = t.keyof({binary: null, leveled: null});
const TReadingBackendKind = t.keyof({kuromoji: null, none: null});

export interface Config {
  knownKanjiFile: string;
  kanjiLevelsFile?: string;
  policy: t.TypeOf<typeof TPolicyKind>;
  readingBackend: t.TypeOf<typeof TReadingBackendKind>;
  kuromojiDict?: string;
  previewChars: number;
  articleBodySelector: string;
  port: number;
  verbose: boolean;
  outputFile?: string;
  levelsScriptFile?: string;
}

export const DEFAULTS = {
  knownKanjiFile: 'data/learned_kanji.json',
  policy: 'binary',
  readingBackend: 'kuromoji',
  previewChars: DEFAULT_PREVIEW_CHARS,
  articleBodySelector: '#js-article-body',
  port: 8133,
} as const;

type Env = Record<string, string|undefined>;

function oneOf<A>(codec: t.Decoder<unknown, A>, name: string, value: string|undefined, fallback: A, log: Logger): A {
  if (value === undefined || value === '') { return fallback; }
  const decoded = codec.decode(value);
  if (isRight(decoded)) { return decoded.right; }
  log.warn(`ignoring ${name}=${value}, using ${fallback}`);
  return fallback;
}

function nonNegativeInt(name: string, value: string|undefined, fallback: number, log: Logger): number {
  if (value === undefined || value === '') { return fallback; }
  const n = Number(value);
  if (Number.isInteger(n) && n >= 0) { return n; }
  log.warn(`ignoring ${name}=${value}, using ${fallback}`);
  return fallback;
}

const orUndefined = (s: string|undefined) => s ? s : undefined;

/**
 * Settings from the environment. Entry points call `dotenv.config()` first, so a `.env` file works too. Bad values are
 * warned about and replaced by defaults.
 */
export function loadConfig(env: Env = process.env, log: Logger = createLogger('Config')): Config {
  return {
    knownKanjiFile: env['KNOWN_KANJI_FILE'] || DEFAULTS.knownKanjiFile,
    kanjiLevelsFile: orUndefined(env['KANJI_LEVELS_FILE']),
    policy: oneOf<Config['policy']>(TPolicyKind, 'KNOWLEDGE_POLICY', env['KNOWLEDGE_POLICY'], DEFAULTS.policy, log),
    readingBackend: oneOf<Config['readingBackend']>(TReadingBackendKind, 'READING_BACKEND', env['READING_BACKEND'],
                                                    DEFAULTS.readingBackend, log),
    kuromojiDict: orUndefined(env['KUROMOJI_DICT']),
    previewChars: nonNegativeInt('PREVIEW_CHARS', env['PREVIEW_CHARS'], DEFAULTS.previewChars, log),
    articleBodySelector: env['ARTICLE_BODY_SELECTOR'] || DEFAULTS.articleBodySelector,
    port: nonNegativeInt('PORT', env['PORT'], DEFAULTS.port, log),
    verbose: /^(1|true|yes)$/i.test(env['LOG_VERBOSE'] ?? ''),
    outputFile: orUndefined(env['OUTPUT_FILE']),
    levelsScriptFile: orUndefined(env['LEVELS_SCRIPT_FILE']),
  };
}

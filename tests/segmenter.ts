import test from 'tape';

import {Segment} from '../interfaces';
import {KanjiLevels, LearnedKanji} from '../knowledge';
import {createMemoryLogger} from '../logger';
import {NoReadings, TransliteratedReadings} from '../readings';
import {reconstruct, renderVariants} from '../render';
import {looksLikeMarkup, Segmenter} from '../segmenter';

import {dictionaryBackend} from './fakes';

const unknown = {tag: 'unknown'} as const;
const known = {tag: 'known'} as const;

function plainSegmenter(learned: string[] = []) {
  const readings = new TransliteratedReadings(dictionaryBackend({'今日': 'きょう', '天気': 'てんき', '良': 'よ'}),
                                              createMemoryLogger());
  return new Segmenter({policy: new LearnedKanji(learned), readings});
}

test('plain text splits into maximal kanji runs', t => {
  const expected: Segment[] = [
    {type: 'kanji', kanji: '今日', reading: 'きょう', classification: unknown},
    {type: 'text', content: 'は'},
    {type: 'kanji', kanji: '良', reading: 'よ', classification: unknown},
    {type: 'text', content: 'い'},
    {type: 'kanji', kanji: '天気', reading: 'てんき', classification: unknown},
    {type: 'text', content: 'です'},
    {type: 'text', content: '。'},
  ];
  t.deepEqual(plainSegmenter().segmentPlainText('今日は良い天気です。'), expected);
  t.end();
});

test('plain text readings are computed for known groups too', t => {
  const segments = plainSegmenter(['今', '日']).segmentPlainText('今日');
  t.deepEqual(segments, [{type: 'kanji', kanji: '今日', reading: 'きょう', classification: known}]);
  t.end();
});

test('one unknown kanji makes the whole group unknown', t => {
  const segmenter = new Segmenter({policy: new LearnedKanji(['漢'])});
  t.deepEqual(segmenter.segmentPlainText('漢字'),
              [{type: 'kanji', kanji: '漢字', reading: '', classification: unknown}]);
  t.end();
});

test('a failed reading does not stop segmentation', t => {
  const segments = plainSegmenter().segmentPlainText('猫と天気');
  t.deepEqual(segments, [
    {type: 'kanji', kanji: '猫', reading: '', classification: unknown},
    {type: 'text', content: 'と'},
    {type: 'kanji', kanji: '天気', reading: 'てんき', classification: unknown},
  ]);
  t.end();
});

test('plain text reconstructs exactly', t => {
  const segmenter = new Segmenter({policy: new LearnedKanji(['日']), readings: new NoReadings()});
  const inputs = [
    '今日は良い天気です。',
    '第一行\n\n第二行！本当？',
    'English only',
    '。。。',
    '\n',
    '漢',
    '東京都の人口は約1400万人です!?あ',
  ];
  for (const input of inputs) { t.equal(reconstruct(segmenter.segmentPlainText(input)), input, input); }
  t.deepEqual(segmenter.segmentPlainText(''), []);
  t.end();
});

test('ruby markup carries its own reading', t => {
  const segmenter = new Segmenter({policy: new LearnedKanji(['去', '年'])});
  t.deepEqual(segmenter.segmentMarkup('<ruby>去年<rt>きょねん</rt></ruby>'),
              [{type: 'kanji', kanji: '去年', reading: 'きょねん', classification: known}]);
  t.end();
});

test('text around ruby becomes text segments', t => {
  const segmenter = new Segmenter({policy: new LearnedKanji(['去', '年'])});
  const html = 'インフルエンザ　<ruby>去年<rt>きょねん</rt></ruby>より5<ruby>週間<rt>しゅうかん</rt></ruby>';
  t.deepEqual(segmenter.segmentMarkup(html), [
    {type: 'text', content: 'インフルエンザ　'},
    {type: 'kanji', kanji: '去年', reading: 'きょねん', classification: known},
    {type: 'text', content: 'より5'},
    {type: 'kanji', kanji: '週間', reading: 'しゅうかん', classification: unknown},
  ]);
  t.end();
});

test('paragraphs, divs and line breaks are kept; other tags are flattened', t => {
  const segmenter = new Segmenter({policy: new LearnedKanji()});
  const html = '<div><p><ruby>天気<rt>てんき</rt></ruby>です<br>はい</p><p><span class="x"><a href="#">リンク</a></span></p></div>';
  const expected: Segment[] = [
    {type: 'html', content: '<div>'},
    {type: 'html', content: '<p>'},
    {type: 'kanji', kanji: '天気', reading: 'てんき', classification: unknown},
    {type: 'text', content: 'です'},
    {type: 'html', content: '<br>'},
    {type: 'text', content: 'はい'},
    {type: 'html', content: '</p>'},
    {type: 'html', content: '<p>'},
    {type: 'text', content: 'リンク'},
    {type: 'html', content: '</p>'},
    {type: 'html', content: '</div>'},
  ];
  const segments = segmenter.segmentMarkup(html);
  t.deepEqual(segments, expected);
  t.equal(reconstruct(segments), '<div><p>天気です<br>はい</p><p>リンク</p></div>');
  t.end();
});

test('incomplete ruby is dropped', t => {
  const segmenter = new Segmenter({policy: new LearnedKanji(), log: createMemoryLogger()});
  t.deepEqual(segmenter.segmentMarkup('<ruby>去年</ruby>'), []);
  t.deepEqual(segmenter.segmentMarkup('<ruby><rt>きょねん</rt></ruby>'), []);
  t.deepEqual(segmenter.segmentMarkup('あ<ruby></ruby>い'), [{type: 'text', content: 'あ'}, {type: 'text', content: 'い'}]);
  t.end();
});

test('rb and rp inside ruby', t => {
  const segmenter = new Segmenter({policy: new LearnedKanji()});
  t.deepEqual(segmenter.segmentMarkup('<ruby><rb>漢字</rb><rp>(</rp><rt>かんじ</rt><rp>)</rp></ruby>'),
              [{type: 'kanji', kanji: '漢字', reading: 'かんじ', classification: unknown}]);
  t.end();
});

test('ruby base wrapped in inline elements', t => {
  const segmenter = new Segmenter({policy: new LearnedKanji()});
  const partly = segmenter.segmentMarkup('<ruby><b>漢</b>字<rt>かんじ</rt></ruby>');
  t.deepEqual(partly, [{type: 'kanji', kanji: '漢字', reading: 'かんじ', classification: unknown}]);
  t.equal(reconstruct(partly), '漢字');
  const wrapped = segmenter.segmentMarkup('<p><ruby><span class="x">漢字</span><rt>かんじ</rt></ruby>です</p>');
  t.equal(reconstruct(wrapped), '<p>漢字です</p>');
  t.deepEqual(wrapped[1], {type: 'kanji', kanji: '漢字', reading: 'かんじ', classification: unknown});
  t.end();
});

test('ruby markup against a level table', t => {
  const segmenter = new Segmenter({policy: new KanjiLevels([['天', 3], ['気', 5], ['今', 1]])});
  const segments = segmenter.segmentMarkup('<p><ruby>天気<rt>てんき</rt></ruby>と<ruby>猫<rt>ねこ</rt></ruby></p>');
  t.deepEqual(segments, [
    {type: 'html', content: '<p>'},
    {type: 'kanji', kanji: '天気', reading: 'てんき', classification: {tag: 'level', level: 5}},
    {type: 'text', content: 'と'},
    {type: 'kanji', kanji: '猫', reading: 'ねこ', classification: {tag: 'unleveled'}},
    {type: 'html', content: '</p>'},
  ]);
  t.equal(renderVariants(segments),
          '<span class="known-version"><p><ruby data-level="5">天気<rt>てんき</rt></ruby>と<ruby>猫<rt>ねこ</rt></ruby></p>' +
              '</span><span class="unknown-version"><p>天気と<ruby>猫<rt>ねこ</rt></ruby></p></span>' +
              '<span class="no-furigana-version"><p>天気と猫</p></span>');
  t.end();
});

test('segment picks the mode from the input', t => {
  const segmenter = plainSegmenter();
  t.ok(looksLikeMarkup('<ruby>去年<rt>きょねん</rt></ruby>'));
  t.ok(looksLikeMarkup('<p>天気</p>'));
  t.notOk(looksLikeMarkup('1 < 2 でも 3 > 2'));
  t.deepEqual(segmenter.segment('天気'), [{type: 'kanji', kanji: '天気', reading: 'てんき', classification: unknown}]);
  t.deepEqual(segmenter.segment('<p>天気</p>'), [
    {type: 'html', content: '<p>'},
    {type: 'text', content: '天気'},
    {type: 'html', content: '</p>'},
  ]);
  t.deepEqual(segmenter.segment(''), []);
  t.end();
});

test('segmentation is deterministic', t => {
  const html = '<p>今日は<ruby>去年<rt>きょねん</rt></ruby>より</p>';
  t.deepEqual(plainSegmenter().segment(html), plainSegmenter().segment(html));
  t.deepEqual(plainSegmenter().segment('今日は良い天気'), plainSegmenter().segment('今日は良い天気'));
  t.end();
});

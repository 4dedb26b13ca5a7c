import test from 'tape';

import {hasKanji, isKanji, kanjiIn, kanjiRuns, visibleLength} from '../kanji';

test('isKanji covers U+4E00 through U+9FAF', t => {
  t.ok(isKanji('一'));
  t.ok(isKanji('龯'));
  t.ok(isKanji('漢'));
  t.notOk(isKanji('䷿'));
  t.notOk(isKanji('龰'));
  t.notOk(isKanji('々'));
  t.notOk(isKanji('あ'));
  t.notOk(isKanji('ア'));
  t.notOk(isKanji('a'));
  t.notOk(isKanji(''));
  t.end();
});

test('kanjiRuns finds maximal runs with offsets', t => {
  t.deepEqual(kanjiRuns('今日は良い天気です。'), [
    {run: '今日', start: 0, end: 2},
    {run: '良', start: 3, end: 4},
    {run: '天気', start: 5, end: 7},
  ]);
  t.deepEqual(kanjiRuns('ひらがなだけ'), []);
  t.deepEqual(kanjiRuns('東京都'), [{run: '東京都', start: 0, end: 3}]);
  t.end();
});

test('kanjiIn and hasKanji skip kana', t => {
  t.deepEqual(kanjiIn('お茶と漢字'), ['茶', '漢', '字']);
  t.ok(hasKanji('お茶'));
  t.notOk(hasKanji('おちゃ'));
  t.end();
});

test('visibleLength counts code points', t => {
  t.equal(visibleLength('漢字'), 2);
  t.equal(visibleLength('𠮷野'), 2);
  t.equal(visibleLength(''), 0);
  t.end();
});

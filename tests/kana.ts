import test from 'tape';

import {kata2hira} from '../kana';

test('katakana to hiragana', t => {
  t.equal(kata2hira('テンキ'), 'てんき');
  t.equal(kata2hira('ヴァイオリン'), 'ゔぁいおりん');
  t.equal(kata2hira('ラーメン'), 'らーめん');
  t.equal(kata2hira('東京タワー'), '東京たわー');
  t.end();
});

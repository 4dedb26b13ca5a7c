const HIRAGANA = "ぁあぃいぅうぇえぉおかがきぎくぐけげこごさざしじすずせぜそぞただちぢっつづてでとどなに" +
                 "ぬねのはばぱひびぴふぶぷへべぺほぼまみむめもゃやゅゆょよらりるれろゎわゐゑをんゔゕゖ";
const KATAKANA = "ァアィイゥウェエォオカガキギクグケゲコゴサザシジスズセゼソゾタダチヂッツヅテデトドナニ" +
                 "ヌネノハバパヒビピフブプヘベペホボマミムメモャヤュユョヨラリルレロヮワヰヱヲンヴヵヶ";

if (HIRAGANA.length !== KATAKANA.length) { throw new Error('kana tables differ in length'); }

const kata2hiraMap: Map<string, string> = new Map(KATAKANA.split('').map((k, i) => [k, HIRAGANA[i]]));

/**
 * Katakana to hiragana, one character at a time. Anything that isn't in the table (the long-vowel mark ー, kanji,
 * Latin, punctuation) passes through untouched.
 */
export function kata2hira(s: string): string { return s.split('').map(c => kata2hiraMap.get(c) ?? c).join(''); }

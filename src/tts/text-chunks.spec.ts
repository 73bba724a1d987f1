import { headOf, splitIntoChunks, splitSentences, tailOf } from './text-chunks';

describe('splitSentences', () => {
  it('splits after terminal punctuation followed by whitespace', () => {
    expect(splitSentences('One. Two! Three? Four')).toEqual(['One.', ' Two!', ' Three?', ' Four']);
  });

  it('keeps ellipses and decimals inside one sentence', () => {
    expect(splitSentences('So... it costs 3.5 million. Done.')).toEqual(['So...', ' it costs 3.5 million.', ' Done.']);
  });

  it('never splits inside a tag', () => {
    expect(splitSentences('[wait. really?] Yes. No.')).toEqual(['[wait. really?] Yes.', ' No.']);
  });
});

describe('splitIntoChunks', () => {
  it('returns short text unchanged', () => {
    const text = '[excited] Hello world.';

    expect(splitIntoChunks(text)).toEqual([text]);
  });

  it('packs whole sentences up to the limit', () => {
    const text = 'Alpha one. Beta two. Gamma three. Delta four.';

    expect(splitIntoChunks(text, 22)).toEqual(['Alpha one. Beta two.', 'Gamma three.', 'Delta four.']);
  });

  it('keeps an oversized sentence whole', () => {
    const long = `${'a'.repeat(30)}.`;

    expect(splitIntoChunks(`Hi. ${long} Bye.`, 10)).toEqual(['Hi.', long, 'Bye.']);
  });

  it('keeps every tag intact', () => {
    const text = '[excited] First part here. [whispers] Second part here. [sigh] Third part here.';

    const chunks = splitIntoChunks(text, 30);

    expect(chunks).toEqual(['[excited] First part here.', '[whispers] Second part here.', '[sigh] Third part here.']);
    expect(chunks.join(' ')).toBe(text);
  });
});

describe('context helpers', () => {
  it('takes the tail and head of text', () => {
    expect(tailOf('abcdef', 2)).toBe('ef');
    expect(headOf('abcdef', 2)).toBe('ab');
    expect(tailOf(undefined)).toBeUndefined();
    expect(headOf('')).toBeUndefined();
  });

  it('never cuts an emoji in half', () => {
    const text = '😀' + 'a'.repeat(199);

    expect(tailOf(text)).toBe(text);
    expect(tailOf(text, 199)).toBe('a'.repeat(199));
    expect(headOf('a'.repeat(199) + '😀b')).toBe('a'.repeat(199) + '😀');
  });
});

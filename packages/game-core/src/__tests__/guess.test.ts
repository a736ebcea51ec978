// packages/game-core/src/__tests__/guess.test.ts

import { validateGuess } from '../index';
import { makePlayer } from '../testing';

describe('validateGuess', () => {
  const john = makePlayer({ firstName: 'John', lastName: 'Smith' });

  it('accepts the exact name', () => {
    expect(validateGuess('John', 'Smith', john)).toBe(true);
  });

  it('ignores case and surrounding whitespace', () => {
    expect(validateGuess(' john ', ' smith ', john)).toBe(true);
  });

  it('rejects a misspelling', () => {
    expect(validateGuess('Jon', 'Smith', john)).toBe(false);
  });

  it('rejects empty input', () => {
    expect(validateGuess('', 'Smith', john)).toBe(false);
    expect(validateGuess('John', '   ', john)).toBe(false);
  });

  it('requires hyphens and inner spaces as stored', () => {
    const colin = makePlayer({ firstName: 'Colin', lastName: 'Kazim-Richards' });
    expect(validateGuess('colin', 'kazim-richards', colin)).toBe(true);
    expect(validateGuess('colin', 'kazim richards', colin)).toBe(false);

    const alexis = makePlayer({ firstName: 'Alexis', lastName: 'Mac Allister' });
    expect(validateGuess('Alexis', 'MacAllister', alexis)).toBe(false);
  });

  it('treats a curly apostrophe like a straight one', () => {
    const mark = makePlayer({ firstName: 'Mark', lastName: "O'Mahony" });
    expect(validateGuess('Mark', 'O’Mahony', mark)).toBe(true);
  });
});

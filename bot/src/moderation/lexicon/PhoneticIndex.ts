const CODE_LENGTH = 4;

const LETTER_GROUPS: ReadonlyArray<readonly [string, string]> = [
  ['BFPV', '1'],
  ['CGJKQSXZ', '2'],
  ['DT', '3'],
  ['L', '4'],
  ['MN', '5'],
  ['R', '6']
];

const DIGIT_FOR_LETTER: ReadonlyMap<string, string> = new Map(
  LETTER_GROUPS.flatMap(([letters, digit]) => [...letters].map(letter => [letter, digit] as const))
);

/**
 * Four-character Soundex-style code. The first character is kept as is;
 * vowels, H, W, Y and anything non-Latin contribute nothing, and a digit equal
 * to the last one appended is skipped even when an uncoded letter sits between
 * them (so "Ashcraft" and "Ashcroft" both give "A261").
 */
export function phoneticCode(word: string): string {
  const chars = [...word.toUpperCase()];
  const first = chars[0];
  if (first === undefined) {
    return '';
  }

  let code = first;
  let last = first;

  for (const char of chars.slice(1)) {
    const digit = DIGIT_FOR_LETTER.get(char);
    if (digit === undefined || digit === last) {
      continue;
    }
    code += digit;
    last = digit;
    if (code.length === CODE_LENGTH) {
      break;
    }
  }

  return code.padEnd(CODE_LENGTH, '0');
}

/**
 * Immutable code → words index over a lexicon. Rebuilt, never mutated.
 */
export class PhoneticIndex {
  private readonly byCode: ReadonlyMap<string, ReadonlySet<string>>;

  private constructor(byCode: Map<string, Set<string>>) {
    this.byCode = byCode;
  }

  static build(words: Iterable<string>): PhoneticIndex {
    const byCode = new Map<string, Set<string>>();

    for (const word of words) {
      const code = phoneticCode(word);
      if (!code) continue;

      const bucket = byCode.get(code);
      if (bucket) {
        bucket.add(word);
      } else {
        byCode.set(code, new Set([word]));
      }
    }

    return new PhoneticIndex(byCode);
  }

  static empty(): PhoneticIndex {
    return new PhoneticIndex(new Map());
  }

  /**
   * True when the token shares a code with any lexicon word. This is
   * intentionally broader than matching the colliding word itself.
   */
  matches(token: string): boolean {
    const code = phoneticCode(token);
    return code !== '' && this.byCode.has(code);
  }

  hasCode(code: string): boolean {
    return this.byCode.has(code);
  }

  wordsFor(code: string): string[] {
    return Array.from(this.byCode.get(code) ?? []).sort();
  }

  codes(): string[] {
    return Array.from(this.byCode.keys()).sort();
  }

  get size(): number {
    return this.byCode.size;
  }
}

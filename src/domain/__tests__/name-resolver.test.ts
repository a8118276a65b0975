import {
  cleanName,
  generateNameVariants,
  isSameName,
  matchName,
  nameSlug,
  normalizeName,
  toWesternOrder,
} from '../names/name-resolver';

const SAMPLE_NAMES = [
  'Ohtani, Shohei',
  'Otani Shouhei',
  'Ichiro Suzuki',
  'Tsuyoshi Shinjo',
  'Kenji Sato',
  'Yuu Darvish',
  'Fukudome Kosuke',
];

describe('cleanName', () => {
  it('lowercases, strips punctuation and collapses whitespace', () => {
    expect(cleanName('  Sato,   Kenji. ')).toBe('sato kenji');
  });

  it('keeps hyphens and non-latin letters', () => {
    expect(cleanName('Jean-Pierre 山田')).toBe('jean-pierre 山田');
  });
});

describe('normalizeName', () => {
  it('rewrites long vowels and romanization clusters to one spelling', () => {
    expect(normalizeName('Ohtani, Shohei')).toBe('otani syoe');
    expect(normalizeName('Otani Shouhei')).toBe('otani syoe');
  });

  it('is idempotent', () => {
    for (const name of SAMPLE_NAMES) {
      const once = normalizeName(name);
      expect(normalizeName(once)).toBe(once);
    }
  });
});

describe('generateNameVariants', () => {
  it('includes the cleaned, normalized and swapped forms', () => {
    const variants = generateNameVariants('Kenji Sato');

    expect(variants.has('kenji sato')).toBe(true);
    expect(variants.has('kenzi sato')).toBe(true);
    expect(variants.has('sato kenji')).toBe(true);
    expect(variants.has('sato kenzi')).toBe(true);
  });

  it('includes single-cluster substitutions', () => {
    const variants = generateNameVariants('Kenji Sato');

    expect(variants.has('kenji satou')).toBe(true);
    expect(variants.has('kenji satoh')).toBe(true);
    expect(variants.has('kendi sato')).toBe(true);
  });

  it('returns an empty set for blank input', () => {
    expect(generateNameVariants('   ').size).toBe(0);
  });
});

describe('matchName', () => {
  it('matches every name against its own normalized form', () => {
    for (const name of SAMPLE_NAMES) {
      expect(matchName(normalizeName(name), name)).toBe(true);
    }
  });

  it('matches a Western-order query against a "Family, Given" candidate', () => {
    expect(matchName('Shohei Ohtani', 'Ohtani, Shohei')).toBe(true);
  });

  it('matches either part of a "Family, Given" candidate', () => {
    expect(matchName('Otani', 'Ohtani, Shohei')).toBe(true);
    expect(matchName('Shouhei', 'Ohtani, Shohei')).toBe(true);
  });

  it('matches a single-token query against any candidate token', () => {
    expect(matchName('Suzuki', 'Ichiro Suzuki')).toBe(true);
  });

  it('matches swapped order without a comma', () => {
    expect(matchName('Sato Kenji', 'Kenji Sato')).toBe(true);
  });

  it('only accepts normalized equality in strict mode', () => {
    expect(matchName('Otani', 'Ohtani, Shohei', true)).toBe(false);
    expect(matchName('Otani Shouhei', 'Ohtani Shohei', true)).toBe(true);
  });

  it('rejects unrelated names', () => {
    expect(matchName('Tanaka', 'Ichiro Suzuki')).toBe(false);
    expect(matchName('', 'Ichiro Suzuki')).toBe(false);
  });
});

describe('isSameName', () => {
  it('accepts the same full name in any order', () => {
    expect(isSameName('Kenji Sato', 'Sato, Kenji')).toBe(true);
    expect(isSameName('Kenji Sato', 'Sato Kenji')).toBe(true);
    expect(isSameName('Sato, Kenji', 'kenji  sato')).toBe(true);
  });

  it('rejects partial and different names', () => {
    expect(isSameName('Kenji Sato', 'Sato')).toBe(false);
    expect(isSameName('Kenji Sato', 'Kenta Sato')).toBe(false);
    expect(isSameName('', '')).toBe(false);
  });
});

describe('toWesternOrder / nameSlug', () => {
  it('reorders "Family, Given"', () => {
    expect(toWesternOrder('Sato, Kenji')).toBe('Kenji Sato');
    expect(toWesternOrder(' Kenji Sato ')).toBe('Kenji Sato');
  });

  it('gives one slug for both orders of a name', () => {
    expect(nameSlug('Sato, Kenji')).toBe('kenzi-sato');
    expect(nameSlug('Kenji Sato')).toBe('kenzi-sato');
  });
});

import { slugify, uniqueSlug } from './slug.util';

describe('slugify', () => {
  it('produces lower-case hyphenated slugs', () => {
    expect(slugify('Intro to Python')).toBe('intro-to-python');
    expect(slugify('  C++ & Data  Structures!  ')).toBe('c-data-structures');
    expect(slugify('Café Crème')).toBe('cafe-creme');
  });
});

describe('uniqueSlug', () => {
  it('appends a numeric suffix until the slug is free', async () => {
    const taken = new Set(['intro-to-python', 'intro-to-python-1']);
    const slug = await uniqueSlug('Intro to Python', async (candidate) => taken.has(candidate));
    expect(slug).toBe('intro-to-python-2');
  });

  it('falls back to a generic base for titles without slug characters', async () => {
    expect(await uniqueSlug('!!!', async () => false)).toBe('course');
  });
});

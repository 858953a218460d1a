import { slugify } from './slug';

describe('slugify', () => {
  it('lower-cases and joins words with dashes', () => {
    expect(slugify('About Our Store')).toBe('about-our-store');
  });

  it('drops accents and trims punctuation at the edges', () => {
    expect(slugify('  Café & Crème!  ')).toBe('cafe-creme');
  });
});

import { sanitizeValue } from './sanitize-input.middleware';

describe('sanitizeValue', () => {
  it('removes script blocks and inline handlers from nested strings', () => {
    const input = {
      title: 'Hello<script>alert(1)</script>',
      body: '<img src="x" onerror="steal()">',
      links: ['javascript:alert(1)', 'https://example.com'],
      quantity: 3,
    };

    expect(sanitizeValue(input)).toEqual({
      title: 'Hello',
      body: '<img src="x" "steal()">',
      links: ['alert(1)', 'https://example.com'],
      quantity: 3,
    });
  });

  it('leaves ordinary markup intact', () => {
    expect(sanitizeValue('<p>Free <b>shipping</b></p>')).toBe('<p>Free <b>shipping</b></p>');
  });
});

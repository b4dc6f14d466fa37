import { defineTokenEnum } from '../src/utils/token-enum.js';

const sample = defineTokenEnum(['none', 'plus', 'vicinity'] as const, { none: '', plus: '+', vicinity: 'VC' });

test('toCanonical returns the display text of a variant', () => {
  expect(sample.toCanonical('plus')).toBe('+');
  expect(sample.toCanonical('none')).toBe('');
});

test('fromString ignores case and surrounding whitespace', () => {
  expect(sample.fromString('vc')).toBe('vicinity');
  expect(sample.fromString(' VC ')).toBe('vicinity');
});

test('fromString maps empty text to the variant whose canonical form is empty', () => {
  expect(sample.fromString('')).toBe('none');
});

test('fromString rejects unknown and missing text', () => {
  expect(sample.fromString('XX')).toBeNull();
  expect(sample.fromString(null)).toBeNull();
  expect(sample.fromString(undefined)).toBeNull();
});

test('alternation escapes regex characters and leaves out empty forms', () => {
  expect(sample.alternation()).toBe('\\+|VC');
  const pattern = new RegExp(`^(${sample.alternation()})$`);
  expect(pattern.test('+')).toBe(true);
  expect(pattern.test('VC')).toBe(true);
  expect(pattern.test('')).toBe(false);
});

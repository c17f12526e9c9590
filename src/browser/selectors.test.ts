import { describe, it, expect } from 'vitest';

import { attributeSelector, describeSelector } from './selectors.js';

describe('describeSelector', () => {
  it.each([
    ['css', '#go', '#go'],
    ['xpath', '//a', 'xpath=//a'],
    ['id', 'go', '[id="go"]'],
    ['name', 'q', '[name="q"]'],
    ['text', 'Sign in', 'text="Sign in"'],
    ['testid', 'email', '[data-testid="email"]'],
  ] as const)('%s', (strategy, value, expected) => {
    expect(describeSelector(value, strategy)).toBe(expected);
  });

  it('defaults to css', () => {
    expect(describeSelector('.item')).toBe('.item');
  });
});

describe('attributeSelector', () => {
  it('quotes the value', () => {
    expect(attributeSelector('name', 'user[email]')).toBe('[name="user[email]"]');
  });

  it('escapes quotes and backslashes', () => {
    expect(attributeSelector('id', 'a"b\\c')).toBe('[id="a\\"b\\\\c"]');
  });
});

import { describe, it, expect } from 'vitest';
import { categorize, getAllCategories, normalize, resolveCategory } from '../api/categorizer.js';

describe('normalize', () => {
  it('trims, lowercases and collapses whitespace', () => {
    expect(normalize('  Joe’s   DINER ')).toBe("joe's diner");
  });
});

describe('categorize', () => {
  it('matches keywords anywhere in the description', () => {
    expect(categorize('Lunch at the diner')).toBe('Food & Dining');
    expect(categorize('Uber to airport')).toBe('Transportation');
    expect(categorize('Netflix subscription')).toBe('Entertainment');
    expect(categorize('Electric bill')).toBe('Bills & Utilities');
    expect(categorize('  COFFEE   beans ')).toBe('Food & Dining');
  });

  it('lets earlier table entries win', () => {
    // "lunch" (food) is listed before "uber" (transportation)
    expect(categorize('uber eats lunch')).toBe('Food & Dining');
  });

  it('falls back to Other', () => {
    expect(categorize('Random thing')).toBe('Other');
    expect(categorize('')).toBe('Other');
  });
});

describe('resolveCategory', () => {
  it('accepts exact category names', () => {
    expect(resolveCategory('Food & Dining')).toBe('Food & Dining');
    expect(resolveCategory('savings & investment')).toBe('Savings & Investment');
  });

  it('finds category names and aliases inside a command', () => {
    expect(resolveCategory('bills & utilities budget')).toBe('Bills & Utilities');
    expect(resolveCategory('set food budget to 400')).toBe('Food & Dining');
    expect(resolveCategory('my travel limit')).toBe('Travel');
  });

  it('falls back to the keyword table', () => {
    expect(resolveCategory('groceries')).toBe('Food & Dining');
  });

  it('returns null when nothing is named', () => {
    expect(resolveCategory('another thing')).toBeNull();
    expect(resolveCategory('gym')).toBeNull();
    expect(resolveCategory('')).toBeNull();
  });
});

describe('getAllCategories', () => {
  it('lists the ten categories in order', () => {
    const categories = getAllCategories();
    expect(categories).toHaveLength(10);
    expect(categories[0]).toBe('Food & Dining');
    expect(categories[9]).toBe('Other');
  });
});

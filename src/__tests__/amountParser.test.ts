import { describe, it, expect } from 'vitest';
import {
  extractBalanceAmount,
  extractBudgetAmount,
  extractCommandAmount,
  extractPaymentMethod,
  hasNumber,
  parseExpense,
} from '../api/amountParser.js';

describe('parseExpense', () => {
  it('reads each supported phrasing', () => {
    expect(parseExpense('Spent $25 on lunch')).toEqual({ amount: 25, description: 'lunch' });
    expect(parseExpense('Paid $150 for groceries')).toEqual({ amount: 150, description: 'groceries' });
    expect(parseExpense('$12 for a taxi')).toEqual({ amount: 12, description: 'a taxi' });
    expect(parseExpense('Gas $45')).toEqual({ amount: 45, description: 'Gas' });
    expect(parseExpense('$28 movie tickets')).toEqual({ amount: 28, description: 'movie tickets' });
  });

  it('accepts thousands separators and cents', () => {
    expect(parseExpense('Spent $1,234.50 on rent.')).toEqual({ amount: 1234.5, description: 'rent' });
  });

  it('drops currency words and a leading preposition from the description', () => {
    expect(parseExpense('I spent 25 dollars on lunch')).toEqual({ amount: 25, description: 'lunch' });
    expect(parseExpense('Spent $25 at Starbucks')).toEqual({ amount: 25, description: 'Starbucks' });
  });

  it('rejects zero amounts and text without an amount', () => {
    expect(parseExpense('Spent $0 on lunch')).toBeNull();
    expect(parseExpense('hello there')).toBeNull();
  });

  it('never reads an amount from the middle of a longer number', () => {
    expect(parseExpense('Spent $12.345 on lunch')).toBeNull();
  });

  it('tries strategies in the order given', () => {
    const first = () => ({ amount: 1, description: 'first' });
    const second = () => ({ amount: 2, description: 'second' });
    expect(parseExpense('anything', [() => null, first, second])).toEqual({ amount: 1, description: 'first' });
  });
});

describe('extractPaymentMethod', () => {
  it('peels the payment phrase off the message', () => {
    expect(extractPaymentMethod('Spent $40 on dinner with my credit card')).toEqual({
      text: 'Spent $40 on dinner',
      paymentMethod: 'Credit Card',
    });
    expect(extractPaymentMethod('Coffee $4 via paypal')).toEqual({ text: 'Coffee $4', paymentMethod: 'PayPal' });
  });

  it('reports Unknown when no payment is mentioned', () => {
    expect(extractPaymentMethod('Lunch $12')).toEqual({ text: 'Lunch $12', paymentMethod: 'Unknown' });
  });
});

describe('extractBalanceAmount', () => {
  it('reads plain, dollar and k amounts', () => {
    expect(extractBalanceAmount('1500')).toBe(1500);
    expect(extractBalanceAmount('$1,500.00')).toBe(1500);
    expect(extractBalanceAmount('about 2.5k')).toBe(2500);
    expect(extractBalanceAmount('My balance is 1,200.50')).toBe(1200.5);
  });

  it('reports negative and zero amounts as they are', () => {
    expect(extractBalanceAmount('My balance is -200')).toBe(-200);
    expect(extractBalanceAmount('0')).toBe(0);
  });

  it('returns null without a number', () => {
    expect(extractBalanceAmount('none')).toBeNull();
  });
});

describe('extractBudgetAmount', () => {
  it('accepts amounts up to 10,000', () => {
    expect(extractBudgetAmount('300')).toBe(300);
    expect(extractBudgetAmount('$10,000')).toBe(10000);
  });

  it('rejects zero and amounts over the cap', () => {
    expect(extractBudgetAmount('20000')).toBeNull();
    expect(extractBudgetAmount('0')).toBeNull();
    expect(extractBudgetAmount('not sure')).toBeNull();
  });
});

describe('extractCommandAmount', () => {
  it('prefers a dollar amount, else the last number', () => {
    expect(extractCommandAmount('Set budget for Food & Dining $500')).toBe(500);
    expect(extractCommandAmount('set food budget to 400')).toBe(400);
    expect(extractCommandAmount('budget 2 for food 300')).toBe(300);
    expect(extractCommandAmount('set food budget')).toBeNull();
  });
});

describe('hasNumber', () => {
  it('detects digits', () => {
    expect(hasNumber('lunch 12')).toBe(true);
    expect(hasNumber('lunch')).toBe(false);
  });
});

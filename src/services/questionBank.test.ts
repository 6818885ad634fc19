import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { pickInOrder } from '../testing/fakes.js';
import { QuestionBank, uniformChoice } from './questionBank.js';

describe('QuestionBank', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delegates selection to the injected random choice', () => {
    const bank = new QuestionBank(['Q1', 'Q2', 'Q3'], pickInOrder(2, 0, 0));

    expect([bank.next(), bank.next(), bank.next()]).toEqual(['Q3', 'Q1', 'Q1']);
  });

  it('rejects an empty or blank question list', () => {
    expect(() => new QuestionBank([])).toThrow();
    expect(() => new QuestionBank(['  '])).toThrow();
  });

  it('loads the chapter questions from disk', async () => {
    const bank = await QuestionBank.fromFile(path.resolve('data/questions.json'));

    expect(bank.questions).toHaveLength(20);
    expect(bank.questions[0]).toBe('What is media?');
  });
});

describe('uniformChoice', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('maps Math.random onto the list', () => {
    const random = vi.spyOn(Math, 'random');

    random.mockReturnValueOnce(0);
    expect(uniformChoice(['a', 'b', 'c'])).toBe('a');
    random.mockReturnValueOnce(0.999);
    expect(uniformChoice(['a', 'b', 'c'])).toBe('c');
    random.mockReturnValueOnce(0.5);
    expect(uniformChoice(['a', 'b', 'c'])).toBe('b');
  });

  it('throws on an empty list', () => {
    expect(() => uniformChoice([])).toThrow(RangeError);
  });
});

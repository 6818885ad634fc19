// src/services/questionBank.ts
// What: The fixed list of chapter questions and uniform random selection over it.
// How: Questions are read from data/questions.json at startup; selection goes through an injectable RandomChoice so
//      tests can pin it. Selection is with replacement: the same question may come up twice in a row.

import fs from 'fs/promises';
import { z } from 'zod';

export type RandomChoice = <T>(items: readonly T[]) => T;

export const uniformChoice: RandomChoice = <T>(items: readonly T[]): T => {
  if (items.length === 0) {
    throw new RangeError('Cannot choose from an empty list');
  }
  return items[Math.floor(Math.random() * items.length)];
};

const questionsSchema = z.array(z.string().trim().min(1)).min(1);

export class QuestionBank {
  readonly questions: readonly string[];

  private readonly choose: RandomChoice;

  constructor(questions: readonly string[], choose: RandomChoice = uniformChoice) {
    this.questions = Object.freeze(questionsSchema.parse(questions));
    this.choose = choose;
  }

  static async fromFile(filePath: string, choose?: RandomChoice): Promise<QuestionBank> {
    const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
    return new QuestionBank(questionsSchema.parse(raw), choose);
  }

  next(): string {
    return this.choose(this.questions);
  }
}

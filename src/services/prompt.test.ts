import { describe, expect, it } from 'vitest';
import { scoredChunk } from '../testing/fakes.js';
import { buildTeachingPrompt, formatPassages } from './prompt.js';

describe('buildTeachingPrompt', () => {
  const chunks = [scoredChunk('Television reaches millions.', 4, 0.9), scoredChunk('Media means communication.', 0, 0.7)];

  it('numbers the passages in the order given', () => {
    expect(formatPassages(chunks)).toBe('1) Television reaches millions.\n2) Media means communication.');
  });

  it('ends with the passages, the question and an open answer heading', () => {
    const prompt = buildTeachingPrompt('What is mass media?', chunks);

    expect(prompt.startsWith('# Identity\n')).toBe(true);
    expect(
      prompt.endsWith(
        '# Passages\n1) Television reaches millions.\n2) Media means communication.\n\n# Question\nWhat is mass media?\n\n# Answer',
      ),
    ).toBe(true);
  });

  it('lists the grounding instructions', () => {
    const prompt = buildTeachingPrompt('What is media?', chunks);

    expect(prompt).toContain(
      [
        '# Instructions',
        '* Use only the information provided in the "Passages" section.',
        '* Explain concepts in short, simple sentences suitable for a 12-year-old.',
        '* Use bullet points (•) for clarity.',
        '* Give one simple real-life example for each explanation.',
        '* Do not add any information that is not in the passages.',
      ].join('\n'),
    );
  });

  it('includes one worked question and answer', () => {
    const prompt = buildTeachingPrompt('What is media?', chunks);

    expect(prompt).toContain('<user_query>\nWhat is a newspaper?\n</user_query>');
    expect(prompt.match(/<assistant_response>/g)).toHaveLength(1);
  });

  it('renders an empty passages section when given no chunks', () => {
    expect(buildTeachingPrompt('Q?', [])).toContain('# Passages\n\n\n# Question\nQ?');
  });
});

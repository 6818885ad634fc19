// src/services/prompt.ts
// What: Grounded teaching prompt for the generation service.
// How: Fixed Identity / Instructions / Example sections, followed by the retrieved passages numbered in the order
//      given, the question, and an open Answer heading.

import type { ScoredChunk } from '../models/types.js';

const IDENTITY =
  'You are a knowledgeable social science teacher who explains concepts from the chapter clearly and simply to ' +
  'school students.';

const INSTRUCTIONS = [
  'Use only the information provided in the "Passages" section.',
  'Explain concepts in short, simple sentences suitable for a 12-year-old.',
  'Use bullet points (•) for clarity.',
  'Give one simple real-life example for each explanation.',
  'Do not add any information that is not in the passages.',
];

const EXAMPLE_QUESTION = 'What is a newspaper?';

const EXAMPLE_ANSWER = [
  '• A newspaper is a printed collection of news that comes out every day or week.',
  '• It tells people about events in their town, their country and the world.',
  '• Reporters collect the news and editors decide what gets printed.',
  'Example: Your family may read the morning paper to find out about a local festival.',
];

export function formatPassages(chunks: readonly ScoredChunk[]): string {
  return chunks.map((c, i) => `${i + 1}) ${c.chunk.text}`).join('\n');
}

export function buildTeachingPrompt(question: string, chunks: readonly ScoredChunk[]): string {
  const prompt = `
# Identity
${IDENTITY}

# Instructions
${INSTRUCTIONS.map((line) => `* ${line}`).join('\n')}

# Example
<user_query>
${EXAMPLE_QUESTION}
</user_query>
<assistant_response>
${EXAMPLE_ANSWER.join('\n')}
</assistant_response>

# Passages
${formatPassages(chunks)}

# Question
${question}

# Answer
`;
  return prompt.trim();
}

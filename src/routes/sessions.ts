// src/routes/sessions.ts
// What: /sessions routes: the UI shell's view of a quiz session.
// How: POST / creates a session with a random question; GET /:id returns its state and history; POST /:id/next draws
//      a new question; DELETE /:id ends the session; POST /:id/answer validates the body with zod and runs one submission. Typed app errors
//      (404 unknown session, 400 blank answer, 409 busy) go to the centralized error handler.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { SessionNotFoundError } from '../errors.js';
import { formatFeedback } from '../services/grading.js';
import type { QuizSession, SessionStore } from '../services/session.js';

const answerSchema = z.object({
  answer: z.string().min(1).max(5000),
});

const NOTICES = {
  no_relevant_chunks: 'No relevant chunks found for this question.',
  generation_failed: 'Error generating answer',
} as const;

function summary(session: QuizSession) {
  return { id: session.id, state: session.state, question: session.currentQuestion };
}

export function sessionsRouter(sessions: SessionStore): Router {
  const router = Router();

  router.post('/', (_req: Request, res: Response) => {
    const session = sessions.create();
    res.status(201).json(summary(session));
  });

  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = sessions.get(String(req.params.id));
      res.json({ ...summary(session), history: session.history });
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/next', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = sessions.get(String(req.params.id));
      session.nextQuestion();
      res.json(summary(session));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = String(req.params.id);
      if (!sessions.delete(id)) throw new SessionNotFoundError(id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/answer', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = sessions.get(String(req.params.id));
      const parsed = answerSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'INVALID_ANSWER' } });
        return;
      }

      const outcome = await session.submit(parsed.data.answer);
      const base = { outcome: outcome.kind, state: session.state, question: outcome.question, history: outcome.history };

      switch (outcome.kind) {
        case 'scored':
          res.json({
            ...base,
            turn: outcome.turn,
            feedback: formatFeedback(outcome.turn.feedbackBand, outcome.turn.similarity),
          });
          return;
        case 'no_relevant_chunks':
          res.json({ ...base, reason: outcome.reason, message: NOTICES.no_relevant_chunks });
          return;
        case 'generation_failed':
          res.json({ ...base, message: `${NOTICES.generation_failed}: ${outcome.message}` });
          return;
      }
    } catch (err) {
      next(err);
    }
  });

  return router;
}

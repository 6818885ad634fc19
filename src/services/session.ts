// src/services/session.ts
// What: One student's quiz session: the current question, the submission state machine and the turn history.
// How: submit() walks awaiting_answer/displayed → retrieving → generating → scoring → displayed. No retrieval
//      result or a failed generation short-circuits to displayed without appending a turn; both are written to
//      the response log together with the submitted answer. Only one submission may be in flight per session.

import { v4 as uuidv4 } from 'uuid';
import defaultLogger, { type Logger } from '../logging.js';
import { InvalidAnswerError, SessionBusyError, SessionNotFoundError, errorMessage } from '../errors.js';
import type { ConversationTurn, FeedbackBand } from '../models/types.js';
import type { EmbeddingClient } from './embeddings.js';
import type { GenerationClient } from './generation.js';
import { gradeSimilarity } from './grading.js';
import { buildTeachingPrompt } from './prompt.js';
import type { QuestionBank } from './questionBank.js';
import type { Retriever } from './retriever.js';
import { cosineSimilarity } from './similarity.js';

export const DEFAULT_TOP_K = 3;

export type SessionState = 'awaiting_answer' | 'retrieving' | 'generating' | 'scoring' | 'displayed';

/** Why retrieval came back empty: the question could not be embedded, or no chunk could be scored against it. */
export type NoChunksReason = 'query_unembedded' | 'no_scored_chunks';

export type SubmissionOutcome =
  | { kind: 'scored'; question: string; turn: ConversationTurn; history: readonly ConversationTurn[] }
  | { kind: 'no_relevant_chunks'; question: string; reason: NoChunksReason; history: readonly ConversationTurn[] }
  | { kind: 'generation_failed'; question: string; message: string; history: readonly ConversationTurn[] };

export interface QuizSessionDeps {
  retriever: Retriever;
  embedder: EmbeddingClient;
  generator: GenerationClient;
  questions: QuestionBank;
  topK?: number;
  logger?: Logger;
  responseLog?: Logger;
}

const BUSY_STATES: ReadonlySet<SessionState> = new Set(['retrieving', 'generating', 'scoring']);

export class QuizSession {
  readonly id: string;

  private stateValue: SessionState = 'awaiting_answer';

  private question: string;

  private readonly turns: ConversationTurn[] = [];

  private readonly deps: QuizSessionDeps;

  private readonly logger: Logger;

  private readonly responseLog: Logger;

  constructor(deps: QuizSessionDeps, id: string = uuidv4()) {
    this.id = id;
    this.deps = deps;
    this.logger = (deps.logger ?? defaultLogger).child({ sessionId: id });
    this.responseLog = (deps.responseLog ?? defaultLogger.child({ log: 'responses' })).child({ sessionId: id });
    this.question = deps.questions.next();
  }

  get state(): SessionState {
    return this.stateValue;
  }

  get currentQuestion(): string {
    return this.question;
  }

  get history(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  get busy(): boolean {
    return BUSY_STATES.has(this.stateValue);
  }

  nextQuestion(): string {
    if (this.busy) throw new SessionBusyError();
    this.question = this.deps.questions.next();
    this.stateValue = 'awaiting_answer';
    return this.question;
  }

  async submit(answer: string): Promise<SubmissionOutcome> {
    if (this.busy) throw new SessionBusyError();
    if (answer.trim().length === 0) throw new InvalidAnswerError();

    const question = this.question;
    const { retriever, embedder, generator, topK = DEFAULT_TOP_K } = this.deps;
    const previous = this.stateValue;

    try {
      this.stateValue = 'retrieving';
      const retrieval = await retriever.retrieve(question, topK);
      const chunks = retrieval.chunks;
      if (chunks.length === 0) {
        const reason: NoChunksReason = retrieval.status === 'query_unembedded' ? 'query_unembedded' : 'no_scored_chunks';
        this.logger.warn({ question, reason }, 'No relevant chunks found');
        this.responseLog.warn(
          { question, user_answer: answer, model_answer: null, similarity: null, reason },
          'No relevant chunks found',
        );
        return this.display({ kind: 'no_relevant_chunks', question, reason, history: this.history });
      }

      this.stateValue = 'generating';
      let modelAnswer: string;
      try {
        modelAnswer = await generator.generate(buildTeachingPrompt(question, chunks));
      } catch (err) {
        const message = errorMessage(err);
        this.logger.error({ err, question }, 'Error generating answer');
        this.responseLog.error({ question, user_answer: answer, error: message }, 'Error generating answer');
        return this.display({ kind: 'generation_failed', question, message, history: this.history });
      }

      this.stateValue = 'scoring';
      const userVec = await embedder.embed(answer);
      const modelVec = await embedder.embed(modelAnswer);
      const similarity = userVec && modelVec ? cosineSimilarity(userVec, modelVec) : null;
      const feedbackBand: FeedbackBand = gradeSimilarity(similarity);

      const turn: ConversationTurn = { question, userAnswer: answer, modelAnswer, feedbackBand, similarity };
      this.turns.push(turn);
      this.responseLog.info(
        { question, user_answer: answer, model_answer: modelAnswer, similarity, feedback: feedbackBand },
        'Answer scored',
      );
      return this.display({ kind: 'scored', question, turn, history: this.history });
    } catch (err) {
      // Not a modelled outcome: restore the pre-submission state
      this.stateValue = previous;
      this.logger.error({ err, question }, 'Submission failed');
      throw err;
    }
  }

  private display(outcome: SubmissionOutcome): SubmissionOutcome {
    this.stateValue = 'displayed';
    return outcome;
  }
}

export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000;
export const DEFAULT_MAX_SESSIONS = 1000;

export interface SessionStoreOptions {
  ttlMs?: number;
  maxSessions?: number;
  now?: () => number;
}

interface StoredSession {
  session: QuizSession;
  lastAccess: number;
}

/**
 * In-memory registry of live sessions. Each session owns its history; collaborators are shared.
 * Sessions idle for longer than ttlMs are dropped (swept on create, checked on get); at maxSessions the least
 * recently used idle session makes room for a new one. Sessions with a submission in flight are never evicted.
 */
export class SessionStore {
  // Insertion order doubles as recency order: get() re-inserts the entry it touches.
  private readonly sessions = new Map<string, StoredSession>();

  private readonly ttlMs: number;

  private readonly maxSessions: number;

  private readonly now: () => number;

  constructor(
    private readonly deps: QuizSessionDeps,
    { ttlMs = DEFAULT_SESSION_TTL_MS, maxSessions = DEFAULT_MAX_SESSIONS, now = Date.now }: SessionStoreOptions = {},
  ) {
    this.ttlMs = ttlMs;
    this.maxSessions = Math.max(1, maxSessions);
    this.now = now;
  }

  create(): QuizSession {
    const now = this.now();
    this.sweep(now);
    for (const [id, stored] of this.sessions) {
      if (this.sessions.size < this.maxSessions) break;
      if (!stored.session.busy) this.sessions.delete(id);
    }

    const session = new QuizSession(this.deps);
    this.sessions.set(session.id, { session, lastAccess: now });
    return session;
  }

  get(id: string): QuizSession {
    const stored = this.sessions.get(id);
    const now = this.now();
    if (!stored || this.expired(stored, now)) {
      this.sessions.delete(id);
      throw new SessionNotFoundError(id);
    }
    stored.lastAccess = now;
    this.sessions.delete(id);
    this.sessions.set(id, stored);
    return stored.session;
  }

  /** Returns false when the id was not known. */
  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  private expired(stored: StoredSession, now: number): boolean {
    return !stored.session.busy && now - stored.lastAccess > this.ttlMs;
  }

  private sweep(now: number): void {
    for (const [id, stored] of this.sessions) {
      if (this.expired(stored, now)) this.sessions.delete(id);
    }
  }
}

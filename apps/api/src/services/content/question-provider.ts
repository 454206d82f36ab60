// =====================================================
// Question Provider
// =====================================================
// Content collaborator. The payload is opaque to the game core; only
// the correct answer is read, and it never leaves the server.

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger';

// ===========================================
// Types
// ===========================================

export interface RoundQuestion {
  questionId: string;
  payload: unknown;
  correctAnswer: string;
}

export interface QuestionProvider {
  /**
   * Question for `round` of `matchId`. `excludeIds` holds questions the
   * match has already used.
   */
  getQuestion(matchId: string, round: number, excludeIds: readonly string[]): Promise<RoundQuestion>;
}

export class ContentUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContentUnavailableError';
  }
}

// ===========================================
// Catalogue Schema
// ===========================================

export const catalogQuestionSchema = z.object({
  id: z.string().min(1),
  category: z.string().optional(),
  prompt: z.string().min(1),
  choices: z.array(z.string()).optional(),
  imageUrl: z.string().url().optional(),
  answer: z.string().min(1),
});

export type CatalogQuestion = z.infer<typeof catalogQuestionSchema>;

export const catalogSchema = z.array(catalogQuestionSchema);

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../../../data/questions.json');

/**
 * Split a catalogue entry into the client payload and the answer.
 */
export function toRoundQuestion(question: CatalogQuestion): RoundQuestion {
  const { answer, ...payload } = question;
  return { questionId: question.id, payload, correctAnswer: answer };
}

// 32-bit FNV-1a, stable across processes
function hashString(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// ===========================================
// Static Catalogue
// ===========================================

/**
 * In-process catalogue. Selection is deterministic per (matchId, round)
 * and skips questions the match has already seen.
 */
export class StaticQuestionProvider implements QuestionProvider {
  constructor(private readonly questions: readonly CatalogQuestion[]) {
    if (questions.length === 0) {
      throw new ContentUnavailableError('Question catalogue is empty');
    }
  }

  static fromFile(filePath: string = DEFAULT_CATALOG_PATH): StaticQuestionProvider {
    const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
    const questions = catalogSchema.parse(raw);
    logger.info(`[Content] Loaded ${questions.length} questions from ${path.basename(filePath)}`);
    return new StaticQuestionProvider(questions);
  }

  async getQuestion(matchId: string, round: number, excludeIds: readonly string[]): Promise<RoundQuestion> {
    const excluded = new Set(excludeIds);
    const start = hashString(`${matchId}:${round}`) % this.questions.length;

    for (let offset = 0; offset < this.questions.length; offset++) {
      const question = this.questions[(start + offset) % this.questions.length];
      if (!excluded.has(question.id)) {
        return toRoundQuestion(question);
      }
    }

    throw new ContentUnavailableError(`No unused question left for match ${matchId}`);
  }
}

// =====================================================
// HTTP Question Catalogue Client
// =====================================================
// Fetches one question per round from an external catalogue service.
// GET {baseUrl}/questions/next?matchId=&round=&exclude=a,b

import axios, { AxiosError, AxiosInstance } from 'axios';
import { logger } from '../../utils/logger';
import {
  catalogQuestionSchema,
  ContentUnavailableError,
  QuestionProvider,
  RoundQuestion,
  toRoundQuestion,
} from './question-provider';

export class HttpQuestionProvider implements QuestionProvider {
  private readonly client: AxiosInstance;

  constructor(baseUrl: string, timeoutMs: number, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: baseUrl,
      timeout: timeoutMs,
      headers: { Accept: 'application/json' },
    });
  }

  async getQuestion(matchId: string, round: number, excludeIds: readonly string[]): Promise<RoundQuestion> {
    try {
      const response = await this.client.get<unknown>('/questions/next', {
        params: { matchId, round, exclude: excludeIds.join(',') },
      });

      const parsed = catalogQuestionSchema.safeParse(response.data);
      if (!parsed.success) {
        logger.warn(`[Content] Invalid question payload for ${matchId} round ${round}`);
        throw new ContentUnavailableError('Question catalogue returned an invalid payload');
      }

      return toRoundQuestion(parsed.data);
    } catch (error) {
      if (error instanceof ContentUnavailableError) {
        throw error;
      }
      const status = error instanceof AxiosError ? error.response?.status : undefined;
      logger.error(`[Content] Catalogue request failed for ${matchId} round ${round} (status ${status ?? 'n/a'})`);
      throw new ContentUnavailableError('Question catalogue unavailable');
    }
  }
}

import type { MakeRequestFn } from '../http';
import { readJson } from '../http';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type { RequestExecutor } from '../request_executor';
import type { ExportFile, ExportPoller } from '../export_poller';
import { InvalidQuestionUpdateError, InvalidSurveyIdError, RemoteAPIError } from '../errors';
import {
  QuestionEnvelopeSchema,
  QuestionListEnvelopeSchema,
  SchemaValidationCache,
} from '../schemas';
import type { QuestionEnvelope, QuestionListEnvelope } from '../schemas';
import type { ExportFormat, Question, SurveyClientDependencies } from './survey_client.types';

const SURVEY_ID_PATTERN = /^SV_[A-Za-z0-9]{15}$/i;

export function isSurveyId(value: string): boolean {
  return SURVEY_ID_PATTERN.test(value);
}

/**
 * Question definitions and response exports for one survey.
 */
export class SurveyClient {
  readonly surveyId: string;
  private readonly request: MakeRequestFn;
  private readonly executor: RequestExecutor;
  private readonly poller: ExportPoller;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(deps: SurveyClientDependencies) {
    if (!isSurveyId(deps.surveyId)) {
      throw new InvalidSurveyIdError(deps.surveyId);
    }
    this.surveyId = deps.surveyId;
    this.request = deps.request;
    this.executor = deps.executor;
    this.poller = deps.poller;
    this.baseUrl = deps.baseUrl;
    this.logger = deps.logger ?? createLogger('[SurveyClient] ');
  }

  private get definitionUrl(): string {
    return `${this.baseUrl}/survey-definitions/${this.surveyId}`;
  }

  async getQuestions(): Promise<Question[]> {
    const { body, status } = await this.getJson(`${this.definitionUrl}/questions`, 'questions');
    const validate = SchemaValidationCache.getValidatorFromSchema<QuestionListEnvelope>(QuestionListEnvelopeSchema);
    if (!validate(body)) {
      throw new RemoteAPIError(`questions of ${this.surveyId} returned an unexpected body`, status);
    }
    this.logger.debug(`Retrieved ${body.result.elements.length} question(s) of ${this.surveyId}`);
    return body.result.elements;
  }

  async getQuestion(questionId: string): Promise<Question> {
    const { body, status } = await this.getJson(
      `${this.definitionUrl}/questions/${encodeURIComponent(questionId)}`,
      `question ${questionId}`,
    );
    const validate = SchemaValidationCache.getValidatorFromSchema<QuestionEnvelope>(QuestionEnvelopeSchema);
    if (!validate(body)) {
      throw new RemoteAPIError(`question ${questionId} of ${this.surveyId} returned an unexpected body`, status);
    }
    return body.result;
  }

  /**
   * Overwrites fields of an existing question and publishes a new survey
   * version. Only fields the current definition already has may be set.
   */
  async updateQuestion(questionId: string, updates: Record<string, unknown>): Promise<Question> {
    const current = await this.getQuestion(questionId);
    const unknownFields = Object.keys(updates).filter((field) => !(field in current));
    if (unknownFields.length > 0) {
      throw new InvalidQuestionUpdateError(questionId, unknownFields);
    }

    const updated: Question = { ...current, ...updates };
    await this.executor.execute(
      {
        method: 'PUT',
        url: `${this.definitionUrl}/questions/${encodeURIComponent(questionId)}`,
        options: { body: updated },
        description: `update question ${questionId} of ${this.surveyId}`,
      },
      'update',
    );
    this.logger.info(`Question ${questionId} updated`);

    await this.executor.execute(
      {
        method: 'POST',
        url: `${this.definitionUrl}/versions`,
        options: { body: { Description: '', Published: true } },
        description: `publish ${this.surveyId}`,
      },
      'update',
    );
    this.logger.info(`Survey ${this.surveyId} published`);
    return updated;
  }

  /**
   * Exports every response through the asynchronous export endpoint.
   */
  async exportResponses(format: ExportFormat = 'csv'): Promise<ExportFile> {
    return this.poller.run(`${this.baseUrl}/surveys/${this.surveyId}/export-responses`, { format });
  }

  private async getJson(url: string, what: string): Promise<{ body: unknown; status: number }> {
    const response = await this.request('GET', url);
    if (!response.ok) {
      throw new RemoteAPIError(`${what} of ${this.surveyId}`, response.status);
    }
    return { body: await readJson(response), status: response.status };
  }
}

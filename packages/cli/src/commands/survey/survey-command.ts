import { promises as fs } from 'fs';
import { Command } from 'commander';
import { stringify } from 'csv-stringify/sync';
import type { ExportPoller, Surveys } from '@listbridge/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface SurveyExportOptions extends BaseCommandOptions {
  format?: string;
  /** Write the rows here instead of stdout */
  output?: string;
}

export interface SurveyQuestionsOptions extends BaseCommandOptions {}

export interface SurveyUpdateQuestionOptions extends BaseCommandOptions {
  /** JSON object of fields to replace */
  set: string;
}

function isExportFormat(value: string): value is Surveys.ExportFormat {
  return value === 'csv' || value === 'tsv';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Renders exported rows with the export's own column order.
 */
export function formatExport(file: ExportPoller.ExportFile, format: Surveys.ExportFormat): string {
  return stringify(file.rows, {
    header: true,
    columns: file.columns,
    delimiter: format === 'tsv' ? '\t' : ',',
  });
}

/**
 * `QID1: How satisfied are you?`
 */
export function describeQuestion(question: Surveys.Question): string {
  const id = typeof question['QuestionID'] === 'string' ? question['QuestionID'] : '(no id)';
  const text = typeof question['QuestionText'] === 'string' ? question['QuestionText'] : '';
  return text ? `${id}: ${text}` : id;
}

export class SurveyCommand extends BaseCommand {

  register(_program: Command): void {
    // Registration handled by registerSurveyCommands() in survey.ts
  }

  async executeExport(surveyId: string, options: SurveyExportOptions): Promise<void> {
    try {
      const format = options.format ?? 'csv';
      if (!isExportFormat(format)) {
        throw new Error(`Unsupported format "${format}" (expected csv or tsv)`);
      }
      const client = await this.services(options).getSurveyClient(surveyId);
      const file = await client.exportResponses(format);
      const content = formatExport(file, format);

      if (options.output !== undefined) {
        await fs.writeFile(options.output, content, 'utf-8');
        this.handleSuccess(
          { fileName: file.fileName, columns: file.columns, rowCount: file.rows.length, output: options.output },
          options,
          `Exported ${file.rows.length} responses to ${options.output}`,
          [],
        );
        return;
      }

      this.handleSuccess(file, options, undefined, [content.trimEnd()]);
    } catch (error) {
      this.handleError(`Failed to export responses: ${this.errorMessage(error)}`, options, error);
    }
  }

  async executeQuestions(surveyId: string, questionId: string | undefined, options: SurveyQuestionsOptions): Promise<void> {
    try {
      const client = await this.services(options).getSurveyClient(surveyId);

      if (questionId !== undefined) {
        const question = await client.getQuestion(questionId);
        this.handleSuccess(question, options);
        return;
      }

      const questions = await client.getQuestions();
      this.handleSuccess(
        questions,
        options,
        `${questions.length} questions in ${surveyId}`,
        questions.map(describeQuestion),
      );
    } catch (error) {
      this.handleError(`Failed to read questions: ${this.errorMessage(error)}`, options, error);
    }
  }

  async executeUpdateQuestion(
    surveyId: string,
    questionId: string,
    options: SurveyUpdateQuestionOptions,
  ): Promise<void> {
    try {
      let updates: unknown;
      try {
        updates = JSON.parse(options.set);
      } catch (error) {
        throw new Error(`--set is not valid JSON: ${this.errorMessage(error)}`);
      }
      if (!isPlainObject(updates)) {
        throw new Error('--set must be a JSON object');
      }

      const client = await this.services(options).getSurveyClient(surveyId);
      const question = await client.updateQuestion(questionId, updates);

      this.handleSuccess(
        question,
        options,
        `Updated ${questionId} and published ${surveyId}`,
        [describeQuestion(question)],
      );
    } catch (error) {
      this.handleError(`Failed to update question: ${this.errorMessage(error)}`, options, error);
    }
  }
}

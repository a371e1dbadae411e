import { Command } from 'commander';
import { SurveyCommand } from './survey-command';
import type {
  SurveyExportOptions,
  SurveyQuestionsOptions,
  SurveyUpdateQuestionOptions,
} from './survey-command';

export function registerSurveyCommands(program: Command): void {
  const surveyCommand = new SurveyCommand();

  const survey = program
    .command('survey')
    .description('Read survey definitions and export responses')
    .alias('s');

  // listbridge survey export SV_0123456789abcde -o responses.csv
  survey
    .command('export <surveyId>')
    .description('Export every response of a survey')
    .option('--format <format>', 'csv or tsv', 'csv')
    .option('-o, --output <path>', 'Write the rows to a file instead of stdout')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (surveyId: string, options: SurveyExportOptions) => {
      await surveyCommand.executeExport(surveyId, options);
    });

  // listbridge survey questions SV_0123456789abcde [QID1]
  survey
    .command('questions <surveyId> [questionId]')
    .description('Show every question definition, or one')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (surveyId: string, questionId: string | undefined, options: SurveyQuestionsOptions) => {
      await surveyCommand.executeQuestions(surveyId, questionId, options);
    });

  // listbridge survey update-question SV_0123456789abcde QID1 --set '{"QuestionText":"..."}'
  survey
    .command('update-question <surveyId> <questionId>')
    .description('Replace fields of a question and publish a new survey version')
    .requiredOption('--set <json>', 'JSON object of existing fields to replace')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (surveyId: string, questionId: string, options: SurveyUpdateQuestionOptions) => {
      await surveyCommand.executeUpdateQuestion(surveyId, questionId, options);
    });
}

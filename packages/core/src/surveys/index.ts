export { SurveyClient, isSurveyId } from './survey_client';
export type { ExportFormat, Question, SurveyClientDependencies } from './survey_client.types';

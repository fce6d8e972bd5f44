export { InsightRepository, DEFAULT_INSIGHT_TYPE } from './InsightRepository';

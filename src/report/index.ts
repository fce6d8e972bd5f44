export { formatJourneySummary, formatCircleInfo, banner, RULE } from './formatReport';

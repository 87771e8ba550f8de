export { formatReport, formatMdeReport, formatResultSummary } from './ReportFormatter';
export { Formatters } from './formatters';

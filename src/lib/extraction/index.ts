export * from './types';
export { ChartImageError, DetectionsFormatError } from './errors';
export { normalizeQuarterLabel, parseQuarterText, formatQuarterKey, parseQuarterKey, compareQuarterKeys } from './quarter-label';
export { parseDecimal, toNumericCandidate } from './numeric';
export { partitionDetections, matchQuartersWithValues, DEFAULT_MATCH_OPTIONS, type MatchOptions } from './matcher';
export { classifyBarRegion, classifyPair, tallyVotes, voteFor, METHOD_RULES } from './bar-classifier';
export { decodeChartImage } from './bar-image';
export { scoreReport, findPreviousRecord, getConfidenceLevel, type ReportScore } from './confidence';
export { ReportTable, buildQuarterMap, createReportRecord, type MergeOutcome } from './report-table';
export { analyzeChart, assembleReport, assembleInto, type ChartInput, type ChartAnalysis } from './chart-pipeline';
export { parseDetectionsFile, parseDetectionsJson } from './detections';
export { reportDateFromFilename } from './report-date';
export { processChartDirectory, type BatchOptions, type BatchSummary } from './batch';

export { extractDomain, normalizeUri, isIpAddress, isDomainName } from './domain.js';
export { enrichRecord, createRecord, field } from './enrich.js';
export { parseKeywords, matchesKeyword } from './filter.js';
export { GroupingKey, groupingKey, groupRecords } from './group.js';
export type { Grouping } from './group.js';
export { selectBest, SELECTION_RULES } from './select.js';
export { tally, keptCategory, formatReport } from './report.js';
export { deduplicate, isLogin, DEFAULT_FOLDER } from './pipeline.js';
export {
  parseExport,
  serializeExport,
  readExportFile,
  writeExportFile,
  defaultOutputPath,
  fileExists,
} from './csv.js';

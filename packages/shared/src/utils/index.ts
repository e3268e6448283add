export { isRecord, numberField } from './guards.js';
export { generateId } from './id.js';
export { monotonicNow, isoNow } from './clock.js';
export { parseTableRef, isQualifiedTableName, formatTableRef } from './table-ref.js';
export { formatIssues } from './validation.js';
export {
  CrewlineError,
  ConnectionError,
  BatchInsertError,
  CheckpointError,
  ConfigError,
  errorMessage,
} from './errors.js';

export * from './types';
export * from './core/errors';
export * from './core/fluent-ast';
export { FluentParser, parseResource, parseFluent, collectProblems } from './core/fluent-parser';
export {
  serializeResource,
  serializeEntry,
  serializePattern,
  serializeExpression,
  patternToSource,
  composeSource,
  entryToParts,
  entryToSource,
  parseUnitSource
} from './core/fluent-serializer';
export { collectReferences } from './core/references';
export { validateId, isValidId, inferFluentType, isCommentType } from './core/id-validator';
export { FluentUnit } from './core/fluent-unit';
export type { FluentUnitOptions } from './core/fluent-unit';
export { FluentFile } from './core/fluent-file';
export { StoreFactory, StoreDirectory } from './core/store-factory';
export type { LocaleStore, FormatDetection, FormattedFile } from './core/store-factory';
export { Validator } from './core/validator';
export { Fixer } from './core/fixer';
export { ReportGenerator } from './core/report-generator';
export { DiffGenerator } from './utils/diff-generator';
export { loadConfig, parseConfigText, ConfigSchema, DEFAULT_CONFIG_FILES } from './utils/config-loader';
export type { ConfigOverrides } from './utils/config-loader';

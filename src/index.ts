export { WhereCondition } from './condition/condition.js';
export {
  GENERIC_MARKER,
  bindGenericMarkers,
  countGenericMarkers,
  numberGenericMarkers,
  shiftPositionalMarkers,
} from './condition/markers.js';
export type { ConditionNode, Combinator } from './condition/types.js';
export { Structure, scalar, nested } from './structure/structure.js';
export type { FieldType, StructureField, ColumnDeclaration } from './structure/structure.js';
export { Projection } from './structure/projection.js';
export type {
  ProjectionField,
  ProjectionPolicy,
  ProjectionOptions,
  SetDefinitionOptions,
} from './structure/projection.js';
export { SourceAliases } from './structure/source-aliases.js';
export { SqlQuery } from './query/sql-query.js';
export type { SqlQueryOptions } from './query/sql-query.js';
export { parseTemplate, listSlots, substituteSlots, slot } from './query/template.js';
export type { TemplatePart, Substitution, SubstituteOptions } from './query/template.js';
export {
  QueryBook,
  SELECT_TEMPLATE,
  DELETE_TEMPLATE,
  INSERT_TEMPLATE,
  INSERT_DEFAULTS_TEMPLATE,
  UPDATE_TEMPLATE,
} from './query/query-book.js';
export type { QueryBookConfig } from './query/query-book.js';
export { defineEntity } from './entity.js';
export type { EntityDefinition } from './entity.js';
export type { SqlParameter, CompiledQuery, Row, SqlEntity } from './types.js';
export { ResultRow } from './store/result-row.js';
export { parseRecord } from './store/record-parser.js';
export { mapRow, mapRows } from './store/row-mapper.js';
export { Provider } from './store/provider.js';
export type { ProviderConfig, SqlExecutor, ExecutionResult } from './store/provider.js';
export {
  ConditionError,
  TemplateError,
  StructureError,
  ProjectionError,
  StatementError,
  HydrationError,
  QueryExecutionError,
} from './errors.js';
export type { TemplateErrorReason } from './errors.js';
export {
  parseConnectionConfig,
  toPoolConfig,
  createPool,
  createConfiguredLogger,
  createProvider,
  DEFAULT_PG_SOCKET_DIR,
} from './config.js';
export type { ConnectionConfig } from './config.js';
export { createLogger, createChildLogger } from './logger.js';
export type { Logger, LogLevel, LoggerConfig } from './logger.js';

// Core data model
export type {
  ObjectKey,
  QualifiedName,
  SourceSpan,
  StatementNode,
  TableNode,
  SequenceNode,
  IndexNode,
  ExtendedPropertyNode,
  AlterTableNode,
  SchemaNode,
  SessionOptionNode,
  RawPassthroughNode,
  Column,
  Constraint,
  DataType,
  DefaultExpression,
  TargetStatement,
  TargetTable,
  TargetColumn,
  TargetConstraint,
  RuleCategory,
  RuleTag,
  Diagnostic,
  FeatureFlags,
  DependencyEdge,
  ConversionState,
} from './model';

export {
  RULE_CATEGORIES,
  createObjectKey,
  objectKeyId,
  sameObjectKey,
  compareObjectKeys,
  resolveObjectKey,
} from './model';

// Errors
export { ParseError, OutputLockedError, NoTableError, ConfigError } from './errors';

// Parsing
export type { ParseResult } from './parser';
export { parseDdl } from './parser';

// Translation rules
export type { TransformContext, TransformResult } from './transformer';
export { transformStatements, DEFAULT_SCHEMA } from './transformer';
export type { TypeMapping } from './typeMapping';
export { mapDataType, formatDataType } from './typeMapping';
export { renderIdentifier, escapeIdentifier, sequenceKey, snakeCase } from './identifiers';

// Dependencies
export { extractDependencies, findDependencyCycles } from './dependencies';
export type { UnresolvedDependency, DependencyStatus, SourceCatalog } from './orchestrator';
export { planDependencies } from './orchestrator';

// Output
export { emitDdl } from './emitter';
export type { ConversionReport, ReportEnvelope, RuleEntry, DependencyGroup } from './report';
export { generateReport, parseReport, reportJsonSchema, reportMatchesDdl } from './report';
export { OutputTree, outputPath, reportPathFor, writeOutputAtomically } from './outputTree';
export { InputTree, discoverTableFiles } from './inputTree';

// Batch conversion
export type { ConvertOptions, FileResult, BatchResult, PlanResult, PreparedFile } from './converter';
export { convertBatch, planBatch, prepareText, renderPrepared } from './converter';

// Configuration
export type { TranslateConfig } from './config';
export { loadConfig } from './config';

// Mermaid diagram generation
export type { MermaidOptions } from './mermaidGenerator';
export { generateMermaid } from './mermaidGenerator';

import { ConfigurableLoggerFactory } from './logging/ConfigurableLoggerFactory';
import { initLogger } from './logging/initLogger';
import { Dataset } from './storage/dataset/Dataset';
import { DATASET_LOCK, GraphLocker } from './storage/dataset/GraphLocker';
import { DatasetGraphControlSource, StaticGraphControlSource } from './storage/dataset/GraphControlSource';
import { EvaluationBudget } from './storage/sparql/EvaluationBudget';
import { OntologyQueryEngine, toNumber } from './storage/sparql/OntologyQueryEngine';
import { PatternMatcher } from './storage/sparql/PatternMatcher';
import { QueryBinder } from './storage/sparql/QueryBinder';
import { TemplateExecutor } from './storage/sparql/TemplateExecutor';
import { OntologyMigration } from './migration/OntologyMigration';
import { SkosMigrationQueries } from './migration/SkosMigrationQueries';
import { DomainCodes, RecordExistsError, UriMapping } from './migration/UriMapping';
import { UriReplacement } from './migration/UriReplacement';

export type { TriplePattern, GraphTriple, GraphTagFilter } from './storage/dataset/Dataset';
export type { GraphControlBinding, GraphControlEntry, GraphControlSource } from './storage/dataset/GraphControlSource';
export type {
  QueryContext,
  QueryResult,
  SelectResult,
  SelectRow,
  SparqlEngine,
} from './storage/sparql/OntologyQueryEngine';
export type { BoundQuery, PrefixTable, QueryForm } from './storage/sparql/QueryBinder';
export type { MutationReport } from './storage/sparql/TemplateExecutor';
export type { PropertyPath } from './storage/sparql/PropertyPath';
export type { Solution } from './storage/sparql/Solution';
export type { MigrationReport, MigrationStepReport } from './migration/OntologyMigration';
export type { MigrationQuery, InsertOptions, ClassToConceptOptions } from './migration/SkosMigrationQueries';
export type { UriMappingOptions } from './migration/UriMapping';
export type { UriReplacementOptions, UriReplacementReport } from './migration/UriReplacement';
export type { EngineOptions, LoggingOptions } from './config/EngineOptions';

export * from './errors/QueryErrors';
export * from './rdf/terms';
export { loadEngineOptions, loadEnvFile, resolveEngineOptions } from './config/EngineOptions';
export * from './vocab';

export {
  ConfigurableLoggerFactory,
  initLogger,
  Dataset,
  DATASET_LOCK,
  GraphLocker,
  DatasetGraphControlSource,
  StaticGraphControlSource,
  EvaluationBudget,
  OntologyQueryEngine,
  toNumber,
  PatternMatcher,
  QueryBinder,
  TemplateExecutor,
  OntologyMigration,
  SkosMigrationQueries,
  DomainCodes,
  RecordExistsError,
  UriMapping,
  UriReplacement,
};

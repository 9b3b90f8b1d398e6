// Model
export {
  createSample,
  mergeSamples,
  EMPTY_SAMPLE,
  METRIC_FIELDS,
  type MetricSample,
  type MetricField,
} from './model/metric-sample.js';
export {
  ResultSet,
  type ResultEntry,
  type SerializedResultEntry,
} from './model/result-set.js';
export {
  ARTIFACT_FORMATS,
  caseKey,
  defaultManifestKey,
  type ArtifactFormat,
  type ArtifactRef,
  type Scenario,
  type TestCase,
  type TestPlan,
  type Tool,
} from './model/test-plan.js';

// Parsing
export { parseDuration } from './parser/duration.js';
export {
  parseMetricText,
  PARSE_STRATEGIES,
  type MetricParseStrategy,
  type ParseOutcome,
} from './parser/strategies.js';
export {
  parseArtifact,
  readArtifact,
  resolveArtifactPath,
  type ArtifactParseOutcome,
} from './parser/artifact-reader.js';
export {
  loadManifest,
  decodeManifest,
  MANIFEST_SCHEMA,
  decodeManifestEntry,
  type Manifest,
  type ManifestIssue,
  type ManifestLoadResult,
  type RawManifest,
} from './manifest/manifest.js';

// Aggregation
export {
  aggregateRun,
  DEFAULT_MANIFEST_FILE,
  type AggregateOptions,
  type AggregatedRun,
  type RunMetadata,
} from './aggregate/run-aggregator.js';

// Configuration
export {
  BUILTIN_TEST_PLANS,
  DEFAULT_TEST_PLAN,
  PROFILE_TEST_PLAN,
  decodeTestPlan,
  getBuiltinTestPlan,
  loadTestPlan,
  type BuiltinPlanName,
} from './config/test-plan.js';

// Errors, results, logging
export { ErrorCode, EXIT_CODES, getExitCode } from './errors/codes.js';
export type { Severity } from './errors/codes.js';
export {
  PortbenchError,
  ArtifactMissingError,
  ArtifactWriteError,
  ConfigurationError,
  MalformedFieldError,
  ManifestError,
  MissingInputError,
  isPortbenchError,
  toError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export {
  ok,
  err,
  type Result,
  type Ok,
  type Err,
} from './types/result.js';
export {
  createStderrLogger,
  silentLogger,
  DEFAULT_LOG_PREFIX,
  type Logger,
  type StderrLoggerOptions,
} from './util/logger.js';

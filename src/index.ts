// Config
export { getConfig, configure, loadConfigFile, resetConfig, defaults } from "./config.js";
export type { EngineConfig, DeepPartial } from "./config.js";

// Errors
export {
  TableQaError,
  ParseError,
  ValidationError,
  GraphMalformedError,
  GraphInvalidError,
  OracleError,
  ConfigError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, TableSchema, QuestionSchema, EvalSampleSchema, EngineConfigSchema } from "./schemas.js";

// Persistence
export { RunStore, RUN_STATUSES } from "./persistence/store.js";
export type { RunStatus, StoredRun, StoredTask } from "./persistence/store.js";

// Pipeline
export { TableQaPipeline, toStoredRun } from "./pipeline.js";
export type { PipelineRun, PipelineOptions, PipelineCallbacks, AnswerOptions, PlanResult } from "./pipeline.js";

// Planning
export { STRATEGY_NAMES, TASK_TYPES } from "./planner/types.js";
export type {
  CellValue,
  Table,
  Question,
  Strategy,
  TaskType,
  SubtaskStatus,
  Subtask,
  SubtaskDraft,
  SubtaskResult,
  SubtaskGraph,
  EvidenceItem,
  GraphIssue,
  IssueCode,
  IssueSeverity,
  ValidationReport,
} from "./planner/types.js";
export { StrategyClassifier, classifyHeuristic, scoreStrategies, parseStrategyLabel } from "./planner/classifier.js";
export type { StrategyClassifierOptions, StrategyScores } from "./planner/classifier.js";
export { TaskDecomposer, normalizeSubtasks } from "./planner/decomposer.js";
export type { TaskDecomposerOptions } from "./planner/decomposer.js";
export { STRATEGIES, strategyDefinition } from "./planner/strategies.js";
export type { StrategyDefinition, ConformanceFinding } from "./planner/strategies.js";
export { validateGraph, hardIssues, structuralIssues } from "./planner/validator.js";
export {
  createSubtaskGraph,
  topologicalLayers,
  topologicalOrder,
  readySubtasks,
  skipDownstream,
  sinkIds,
  leafIds,
} from "./planner/task-graph.js";

// Execution
export { Executor } from "./executor/executor.js";
export { ExecutionContext } from "./executor/context.js";
export type {
  ExecutorOptions,
  ExecutionOptions,
  ExecutionResult,
  ExecutionStatus,
  TaskFailure,
} from "./executor/types.js";

// Retrieval
export { RetrievalFusion, normalizeScores } from "./retrieval/fusion.js";
export type { FusionOptions } from "./retrieval/fusion.js";
export { ToolRegistry } from "./retrieval/registry.js";
export type { RetrievalTool, ToolHit } from "./retrieval/types.js";
export { KeywordTool } from "./retrieval/tools/keyword.js";
export { Bm25Tool } from "./retrieval/tools/bm25.js";
export type { Bm25Options } from "./retrieval/tools/bm25.js";
export { DenseTool, cosineSimilarity } from "./retrieval/tools/dense.js";
export type { DenseToolOptions, Embedder } from "./retrieval/tools/dense.js";

// Answers
export { assembleAnswer, wrapAnswer } from "./answer/assembler.js";
export type { AssembledAnswer } from "./answer/assembler.js";
export { extractAnswer, normalizeAnswer, formatScore, exactMatch, computeAccuracy } from "./answer/comparator.js";
export type { AccuracyReport } from "./answer/comparator.js";

// Oracles
export type { ReasoningOracle } from "./oracle/oracle.js";
export { isRetryableOracleError } from "./oracle/oracle.js";
export { FunctionOracle } from "./oracle/function-oracle.js";
export type { OracleFunction, FunctionOracleOptions } from "./oracle/function-oracle.js";
export { HttpOracle } from "./oracle/http-oracle.js";
export type { HttpOracleOptions } from "./oracle/http-oracle.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";

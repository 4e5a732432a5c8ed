// Model interface & types
export {
  type ModelBackend,
  type ModelProfile,
  type ChatMessage,
  type GenerationParams,
  type GenerationRequest,
  type Generation,
  type StreamChunk,
  type ModelClient,
  type CredentialProvider,
  estimateConfidence
} from './model-interface'

// Errors
export {
  type ErrorScope,
  type QueryErrorCode,
  type RemoteErrorCode,
  type RemoteErrorKind,
  ConductorError,
  QueryError,
  InvalidQueryError,
  ClassificationError,
  RemoteError,
  errorMessage
} from './errors'

// Clients
export { OpenAICompatibleClient } from './providers/openai-compatible-client'
export { ClaudeClient } from './providers/claude-client'
export { createModelClient } from './providers/create-model-client'

// Registry & health
export {
  CircuitBreaker,
  type CircuitState,
  type CircuitOptions,
  type CircuitLease,
  type CircuitTransition,
  type ModelHealthState
} from './circuit-breaker'
export { ModelRegistry } from './model-registry'

// Routing
export {
  KeywordClassifier,
  DEFAULT_SIGNATURES,
  FALLBACK_CATEGORY,
  freezeClassification,
  type TaskClassifier,
  type TaskClassification,
  type CategoryScore,
  type CategorySignature,
  type CategorySignatures,
  type SignaturePattern
} from './task-classifier'
export {
  TaskRouter,
  primaryEntries,
  type TaskRouterOptions,
  type ModelPlan,
  type PlanEntry,
  type PlanRole,
  type RoutedQuery,
  type LatencySource
} from './task-router'

// Orchestration
export { DEFAULT_RETRY_POLICY, backoffDelay, sleep, type RetryPolicy } from './retry-policy'
export {
  Orchestrator,
  type OrchestratorOptions,
  type DispatchRequest,
  type ExecuteOptions,
  type ExecutionResult,
  type StreamEvent,
  type PerformanceRecorder
} from './orchestrator'

// Synthesis
export {
  ResponseSynthesizer,
  weightedConfidence,
  similarity,
  lastSentenceBoundary,
  codeBlocks,
  keyPoints,
  type AnswerFragment,
  type MergeStrategy,
  type SynthesizerOptions,
  type SynthesisContext,
  type SynthesizedResponse,
  type ModelInvocationResult,
  type InvocationStatus,
  type ResponseStatus,
  type ResponseError,
  type TraceEntry,
  type MergeState,
  type MergeInput,
  type MergeEmit
} from './response-synthesizer'

// Context management
export {
  ContextManager,
  estimateTokens,
  trimMessages,
  type ConversationTurn,
  type ContextManagerOptions
} from './context-manager'

// Performance & metrics
export {
  PerformanceMonitor,
  SYNTHESIS_SUBJECT,
  type PerformanceMonitorOptions,
  type PerformanceRecord,
  type PerformanceEntry,
  type PerformanceSink,
  type PerformanceStats,
  type PerformanceAggregate,
  type MetricsExporter
} from './performance-monitor'
export { PromMetricsExporter } from './metrics-exporter'

// Cache & credentials
export { ResponseCache, type ResponseCacheOptions } from './response-cache'
export { SecretsBridge, type SecretsBridgeOptions } from './secrets-bridge'

// Facade
export {
  Conductor,
  createConductor,
  validateQuery,
  querySchema,
  MAX_QUERY_LENGTH,
  type Query,
  type RateLimiter,
  type HealthReport,
  type ModelVerification,
  type OverallHealth,
  type ConductorParts,
  type ConductorDeps,
  type StreamOptions
} from './conductor'

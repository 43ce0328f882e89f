export {
  RetrievalOrchestrator,
  NOT_FOUND_ANSWER,
  DEFAULT_ORCHESTRATOR_OPTIONS,
  type ResolutionOutcome,
  type TopicContentRequest,
  type TopicContentResolution,
  type OrchestratorDependencies,
  type OrchestratorOptions,
} from './orchestrator.js';
export {
  TemplateAnswerer,
  LlmAnswerer,
  TEMPLATE_ANSWER,
  createAnswerer,
  createOpenAiClient,
  openAiCompletion,
  type Answerer,
  type CompletionFn,
  type CompletionRequest,
} from './answerer.js';

export { AutoMergeEngine, compareMerged } from "./auto-merge"
export { BaseRetriever, compareScored } from "./base-retriever"
export { assembleContext, CONTEXT_JOINER } from "./context"
export { QueryOrchestrator } from "./orchestrator"
export type { ContextResult, QueryOrchestratorInput, QueryResult } from "./orchestrator"
export type { AssembledContext, Citation, MergedNode, ScoredID } from "./types"

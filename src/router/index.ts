/**
 * Meta-tool routing module exports.
 *
 * @module router
 */

export {
  type AuthIntention,
  type AuthResult,
  type CatalogSearchResult,
  type CatalogToolHit,
  type CollectionHit,
  type DiscoveryResult,
  Dispatcher,
  type DispatcherOptions,
  type ExecuteRequest,
  type ManageRequest,
  parseParamBlock,
  type SearchLimits,
  type ServerStatusLabel,
  type UpsertSetRequest,
} from "./dispatcher.js";
export {
  connectSuggestion,
  type ErrorContext,
  type ErrorEnvelope,
  failure,
  type Outcome,
  success,
  toErrorEnvelope,
} from "./envelope.js";

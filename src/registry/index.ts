/**
 * Server/Set registry module exports.
 *
 * @module registry
 */

export {
  type NamedSet,
  type RegistryChangeListener,
  type RegistryWatcher,
  ServerRegistry,
  type ServerRegistryOptions,
} from "./registry.js";
export {
  codecFor,
  decodeRegistry,
  detectFormat,
  legacyCodec,
  nestedCodec,
  type DecodeResult,
  type RegistryCodec,
  type RegistryDocument,
} from "./codecs.js";
export {
  HttpServerSchema,
  normalizeServerEntry,
  normalizeStoredSet,
  type HttpServerDefinition,
  type RemoteServerDefinition,
  type ServerDefinition,
  type ServerDefinitionInput,
  ServerDefinitionSchema,
  type SetDetails,
  type SseServerDefinition,
  SseServerSchema,
  type StdioServerDefinition,
  StdioServerSchema,
  type StoredSet,
  type TransportKind,
} from "./schema.js";

export * from "./errors.js";
export { StructuredLogger, createLoggerFromEnv, type Logger, type LoggerOptions, type LogEntry, type LogLevel } from "./logger.js";
export * from "./config/protocol.js";

export * from "./content/model.js";
export { register, verifyDatafile, serializeDatafile, deserializeDatafile } from "./content/datafile.js";
export {
  buildDataset,
  getFileByName,
  filterFilesByTag,
  datasetChecksum,
  serializeDataset,
  deserializeDataset,
} from "./content/dataset.js";
export { buildManifest, getDataset, verifyManifest, serializeManifest, deserializeManifest } from "./content/manifest.js";
export {
  applyFilters,
  filterDatafiles,
  filterDatasets,
  orderBy,
  satisfies,
  DATAFILE_ATTRIBUTES,
  DATASET_ATTRIBUTES,
  type AttributeReaders,
  type AttributeValue,
  type FilterOptions,
  type FilterSpec,
} from "./content/filter.js";
export { normaliseTags, parseTag, subtags, hasTag } from "./content/tags.js";
export { computeChecksum, combinedChecksum, CHECKSUM_ALGORITHM } from "./content/checksum.js";
export {
  FileBlobStore,
  InMemoryBlobStore,
  SchemeRoutingBlobStore,
  toAbsoluteUri,
  type BlobStore,
  type BlobDescription,
} from "./gateways/blobStore.js";

export * from "./protocol/envelope.js";
export { EnvelopeCodec, StreamReassembler, encode, decode, type StreamMessage } from "./protocol/codec.js";
export {
  manifestSchema,
  validateStrand,
  zodSchemaValidator,
  type DatasetRequirement,
  type DocumentSchema,
  type SchemaValidator,
  type ServiceSchema,
  type Strand,
} from "./validation/schemas.js";

export type { BusDelivery, BusSubscribeOptions, BusSubscription, MessageAttributes, MessageBus } from "./transport/bus.js";
export { InMemoryBus, type InMemoryBusOptions, type PublishedRecord } from "./transport/memoryBus.js";
export {
  RedisStreamsBus,
  createRedisStreamsBus,
  fromIoredis,
  type RedisCommandClient,
  type RedisStreamsBusOptions,
} from "./transport/redisStreamsBus.js";
export {
  TransportAdapter,
  type DeliveryControl,
  type EnvelopeHandler,
  type EnvelopeHandlerMeta,
  type SubscribeOptions,
  type SubscriptionHandle,
  type SubscriptionStats,
} from "./transport/adapter.js";
export { answerDestination, deadLetterDestination, questionDestination } from "./transport/destinations.js";

export {
  CorrelationRegistry,
  TERMINAL_STATES,
  isTerminalState,
  type Invocation,
  type InvocationState,
  type Outcome,
} from "./registry/correlationRegistry.js";
export {
  ChildServiceProxy,
  type AskResult,
  type ChildDescriptor,
  type InvocationSnapshot,
  type QuestionOptions,
  type StreamHandlers,
} from "./invoker/invoker.js";
export { Child } from "./invoker/child.js";
export { ParentServiceResponder, type ParentServiceResponderOptions, type ResponderStats } from "./responder/responder.js";
export type { AnalysisContext, AnalysisFunction, AnalysisResult } from "./responder/analysis.js";
export { RelayService, createBusFromEnv, type RelayServiceOptions, type ServeOptions } from "./service.js";

export { Rpc } from "./api/api.js";
export { declareMethod, getMethodMeta, getServiceMeta } from "./api/registry.js";
export type { ApiArgOptions, ApiMethodOptions, ApiServiceMeta, MethodSignature } from "./api/registry.js";

export * from "./types/descriptor.js";
export * from "./types/context.js";

export * from "./rpc/errors.js";
export * from "./rpc/method.js";
export { scan, scanSession, type ScanOptions } from "./rpc/scanner.js";
export * from "./rpc/dispatcher.js";

export { decode, decodeValue, encode, parseJson, schemaFor, toWire } from "./codec/json.js";

export * from "./schema/node.js";
export * from "./schema/registry.js";
export * from "./schema/walker.js";
export * from "./schema/openapi.js";

export * from "./codegen/typescript.js";

export * from "./http/router.js";
export * from "./http/node.js";

export * from "./client/client.js";

export { createLogger, silentLogger, LOG_LEVELS, type Logger, type LogLevel, type LogSink } from "./internal/logger.js";
export { ConfigError, DEFAULT_MAX_BODY_BYTES, loadConfig, type RuntimeConfig } from "./internal/config.js";

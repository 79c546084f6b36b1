export {
  JSONRPC_VERSION,
  JsonRpcBatchSchema,
  JsonRpcRequestSchema,
  describeVersionMismatch,
  errorResponse,
  isErrorResponse,
  isNotification,
  successResponse,
  type JsonRpcErrorObject,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type JsonValue,
} from "./rpc/protocol.js";
export {
  InternalError,
  InvalidParamsError,
  InvalidRequestError,
  JSON_RPC_ERROR_TAXONOMY,
  MethodNotFoundError,
  ParseError,
  RegistrationError,
  RpcError,
  createRpcError,
  describeErrorData,
  hasFields,
  toJsonRpc,
  type ErrorWithFields,
  type RpcErrorCategory,
  type StructuredErrorData,
} from "./rpc/errors.js";
export {
  PayloadDecodeError,
  PayloadEncodeError,
  allocatePayload,
  decodePayload,
  encodePayload,
  payload,
  type PayloadOptions,
  type PayloadPort,
} from "./rpc/payload.js";
export {
  UseCase,
  hasDescription,
  hasInputPort,
  hasIsDeprecated,
  hasName,
  hasOutputPort,
  hasTags,
  hasTitle,
  interact,
  type HasDescription,
  type HasInputPort,
  type HasIsDeprecated,
  type HasName,
  type HasOutputPort,
  type HasTags,
  type HasTitle,
  type InteractContext,
  type InteractFn,
  type Interactor,
  type UseCaseDefinition,
} from "./rpc/usecase.js";
export {
  composeMiddlewares,
  createFailingInteractor,
  createLoggingMiddleware,
  type LoggingMiddlewareOptions,
  type Middleware,
} from "./rpc/middleware.js";
export {
  MethodRegistry,
  type MethodCollector,
  type MethodEntry,
  type MethodRegistryOptions,
  type RegisterOptions,
} from "./rpc/registry.js";
export { Dispatcher, type DispatcherOptions } from "./rpc/dispatcher.js";
export { dispatchBatch, type BatchOptions, type BatchOutcome } from "./rpc/batch.js";
export type { SchemaPhase, SchemaSource, ValidationPort } from "./validation/port.js";
export { PARAMS_FIELD, RESULT_FIELD, ValidationErrors } from "./validation/validationErrors.js";
export { JsonSchemaValidator, ROOT_FAILURE_ISSUE, SchemaCompileError } from "./validation/jsonSchemaValidator.js";
export {
  OpenApiCollector,
  toValidationSchema,
  type OpenApiCollectorOptions,
  type OpenApiDocument,
  type OpenApiOperation,
  type OperationSetup,
} from "./openapi/collector.js";
export { getRpcCall, runWithRpcCall, type CallContext, type RpcCallSnapshot } from "./infra/rpcContext.js";
export { LOG_LEVELS, StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { DEFAULT_MAX_BODY_BYTES, PayloadTooLargeError, readRawBody } from "./http/body.js";
export { DEFAULT_ENDPOINT_SETTINGS, loadEndpointSettingsFromEnv, type EndpointSettings } from "./serverOptions.js";
export { JsonRpcEndpoint, createEndpoint, type EndpointReply, type JsonRpcEndpointOptions } from "./server.js";
export {
  JSON_CONTENT_TYPE,
  createHttpHandler,
  type HttpHandlerOptions,
  type HttpRequestLike,
  type HttpResponseLike,
} from "./httpServer.js";

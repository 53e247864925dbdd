// backend/services/shared/src/index.ts
export {
  handlerMethodName,
  resolveHandlerName,
  type ActionName,
  type AliasMap,
} from "./respond/actionResolver";
export {
  RespondableController,
  type ControllerClass,
} from "./respond/RespondableController";
export {
  HttpStatus,
  isRenderedResponse,
  statusCodeOf,
  type ContextFn,
  type CrudHandlerOptions,
  type EmitOptions,
  type HttpStatusName,
  type RenderWithOptions,
  type RenderedResponse,
  type RequestParams,
  type ResponseHandler,
  type ResponseScope,
  type RestHandlerOptions,
} from "./respond/responseTypes";
export type { HandlerDefinition, HandlerKind } from "./respond/responseDefinitions";
export { RECORD_DELETED_MESSAGE, REST_ACTIONS } from "./respond/defaultResponses";
export { unsupportedActionBody, type UnsupportedActionBody } from "./respond/invalidAction";

export { ResponderBase, type ResponderClass } from "./responder/ResponderBase";
export { ApplicationResponder } from "./responder/ApplicationResponder";

export { SerializerBase } from "./serializer/SerializerBase";
export { SerializerRegistry } from "./serializer/SerializerRegistry";
export { serializeCollection, serializeItem } from "./serializer/serializable";
export type {
  SerializationContext,
  SerializerClass,
  SerializerInstance,
} from "./serializer/serializerTypes";

export {
  PaginatedList,
  isPaginated,
  paginate,
  paginationMeta,
  type Paginated,
  type PaginationMeta,
} from "./pagination/pagination";
export {
  isCollection,
  isPersistable,
  isPlainObject,
  type PersistableRecord,
} from "./record/recordTypes";

export * from "./errors/respondErrors";
export * from "./contracts/responses";
export { loadSharedConfig, type SharedConfig, type LogLevel } from "./config/sharedConfig";
export { getLogger, setRootLogger, resetRootLogger, type IBoundLogger } from "./logger/Logger";

export {
  ControllerExpressBase,
  routeTo,
  type ActionMethod,
  type ExpressControllerCtor,
} from "./base/controller/ControllerExpressBase";
export { createServiceApp, type CreateServiceAppOptions } from "./app/createServiceApp";
export { problem, notFound } from "./middleware/problem";
export { makeHttpLogger } from "./middleware/httpLogger";

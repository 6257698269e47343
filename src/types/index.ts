export type { Scalar, JsonValue, JsonObject, BodyValue } from './value.js';
export type { Collection, Step, Expectation } from './collection.js';
export type { Issue, FlowResult, SingleStepResult, FlowEvent } from './flow-result.js';
export type {
  RequestErrorKind,
  RequestError,
  RequestBody,
  HttpRequestSpec,
  HttpResponse,
  ExecuteResult,
  FetchFn,
} from './http.js';

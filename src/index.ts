export * from './types/index.js';
export { classifyValue, parseBody, parseJson, toJson, stringify, jsonEquals, isJsonObject } from './types/value.js';
export {
  CollectionSchema,
  StepSchema,
  ExpectationSchema,
  JsonValueSchema,
  formatSchemaError,
  bodyNotAllowed,
  MAX_TIMEOUT_SECONDS,
} from './schemas/index.js';
export { substitute, interpolateStep } from './collection/template.js';
export type { Variables } from './collection/template.js';
export { VariableStore } from './collection/variable-store.js';
export { loadCollectionFile, CollectionLoadError } from './collection/loader.js';
export type { CollectionLoadErrorKind } from './collection/loader.js';
export { extractPath, extractVariables } from './engine/path-extractor.js';
export type { PathLookup } from './engine/path-extractor.js';
export { validateResponse } from './engine/validator.js';
export type { ObservedResponse } from './engine/validator.js';
export { HttpSession, resolveUrl, toRequestBody, MAX_TIMER_DELAY_MS } from './http/http-session.js';
export type { HttpSessionOptions } from './http/http-session.js';
export { classifyRequestError, describeError } from './exception/classifier.js';
export { FlowRunner } from './runner/flow-runner.js';
export type { FlowRunnerOptions, RunFlowOptions } from './runner/flow-runner.js';
export { runSingleStep, AD_HOC_LOCATION } from './runner/single-step.js';
export type { SingleStepOptions, SingleStepDeps } from './runner/single-step.js';
export { ResultLog } from './logging/result-log.js';
export type { ResultSink, ResultLogEntry } from './logging/result-log.js';
export { buildReport, buildJsonReport } from './logging/report.js';
export type { ReportOptions } from './logging/report.js';
export { DEFAULT_SETTINGS, SettingsSchema, SettingsError, loadSettings } from './config/settings.js';
export type { RunnerSettings } from './config/settings.js';

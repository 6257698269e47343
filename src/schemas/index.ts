export {
  JsonValueSchema,
  ExpectationSchema,
  StepSchema,
  CollectionSchema,
  formatSchemaError,
  bodyNotAllowed,
  MAX_TIMEOUT_SECONDS,
} from './collection.schema.js';

export { createLoggingMiddleware, LOGGING_MIDDLEWARE_ID } from "./logging.js";
export { createInputValidateMiddleware, VALIDATE_INPUT_MIDDLEWARE_ID } from "./validate-input.js";
export { createJsonSerializeMiddleware, SERIALIZE_JSON_MIDDLEWARE_ID } from "./serialize-json.js";
export { createRequestIdMiddleware, REQUEST_ID_MIDDLEWARE_ID, REQUEST_ID_HEADER } from "./request-id.js";
export { createHeadersMiddleware } from "./headers.js";
export {
  createRetryMiddleware,
  calculateDelay,
  sleep,
  RETRY_MIDDLEWARE_ID,
  RETRY_ATTEMPT_HEADER,
  type RetryPolicy,
} from "./retry.js";
export { createJsonDeserializeMiddleware, DESERIALIZE_JSON_MIDDLEWARE_ID } from "./deserialize-json.js";

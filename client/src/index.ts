// Client
export {
  OperationClient,
  type OperationClientOptions,
  type InvokeOptions,
} from "./client.js";

// Config
export * from "./config.js";

// Errors
export * from "./errors.js";

// Operation stack
export * from "./operation-stack.js";
export * from "./request.js";

// Transport
export * from "./transport/index.js";

// Middleware
export * from "./middleware/index.js";

// Context
export * from "./context.js";

// Errors
export * from "./errors.js";

// Logging
export * from "./logger.js";

// Handlers, middleware and the chain composer
export * from "./handler.js";

// Ordered registry
export * from "./ordered-ids.js";

// Typed steps
export {
  Step,
  type StepOptions,
  type TypeGuard,
  acceptAny,
  guardFromSchema,
  narrow,
} from "./step.js";
export * from "./step-initialize.js";
export * from "./step-serialize.js";
export * from "./step-build.js";
export * from "./step-finalize.js";
export * from "./step-deserialize.js";

// Stack
export * from "./stack.js";

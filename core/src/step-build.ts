import { middlewareFunc, type Handler, type Middleware, type MiddlewareFunc } from "./handler.js";
import { Step, narrow, type StepOptions, type TypeGuard } from "./step.js";

/**
 * Input for BuildMiddleware. Middleware may modify the request before
 * forwarding the input to the next BuildHandler.
 */
export interface BuildInput<TRequest = unknown> {
  request: TRequest;
}

/** Result returned by the next BuildHandler. */
export interface BuildOutput {
  result: unknown;
}

export type BuildHandler<TRequest = unknown> = Handler<BuildInput<TRequest>, BuildOutput>;

export type BuildMiddleware<TRequest = unknown> = Middleware<BuildInput<TRequest>, BuildOutput>;

/** Returns a BuildMiddleware with the given id invoking `fn`. */
export function buildMiddlewareFunc<TRequest = unknown>(
  id: string,
  fn: MiddlewareFunc<BuildInput<TRequest>, BuildOutput>,
): BuildMiddleware<TRequest> {
  return middlewareFunc(id, fn);
}

export interface BuildStepOptions<TRequest> extends StepOptions {
  /** Checks the request handed to the step. Pass `acceptAny` to skip the check. */
  isRequest: TypeGuard<TRequest>;
}

/**
 * Ordered group of BuildMiddleware. Runs after the request has been
 * serialized, to add request-level details such as headers.
 */
export class BuildStep<TRequest = unknown> extends Step<BuildInput<TRequest>, BuildOutput> {
  readonly id = "Build stack step";
  private readonly isRequest: TypeGuard<TRequest>;

  constructor(options: BuildStepOptions<TRequest>) {
    super(options);
    this.isRequest = options.isRequest;
  }

  protected toInput(input: unknown): BuildInput<TRequest> {
    return { request: narrow(this.id, "request", input, this.isRequest) };
  }

  protected forward(input: BuildInput<TRequest>): unknown {
    return input.request;
  }

  protected toOutput(result: unknown): BuildOutput {
    return { result };
  }

  protected fromOutput(output: BuildOutput): unknown {
    return output.result;
  }
}

import { middlewareFunc, type Handler, type Middleware, type MiddlewareFunc } from "./handler.js";
import { Step, narrow, type StepOptions, type TypeGuard } from "./step.js";

/**
 * Input for FinalizeMiddleware. Runs once the request is fully built;
 * retries and signing belong here since everything after it is sent as is.
 */
export interface FinalizeInput<TRequest = unknown> {
  request: TRequest;
}

export interface FinalizeOutput {
  result: unknown;
}

export type FinalizeHandler<TRequest = unknown> = Handler<FinalizeInput<TRequest>, FinalizeOutput>;

export type FinalizeMiddleware<TRequest = unknown> = Middleware<FinalizeInput<TRequest>, FinalizeOutput>;

export function finalizeMiddlewareFunc<TRequest = unknown>(
  id: string,
  fn: MiddlewareFunc<FinalizeInput<TRequest>, FinalizeOutput>,
): FinalizeMiddleware<TRequest> {
  return middlewareFunc(id, fn);
}

export interface FinalizeStepOptions<TRequest> extends StepOptions {
  isRequest: TypeGuard<TRequest>;
}

export class FinalizeStep<TRequest = unknown> extends Step<FinalizeInput<TRequest>, FinalizeOutput> {
  readonly id = "Finalize stack step";
  private readonly isRequest: TypeGuard<TRequest>;

  constructor(options: FinalizeStepOptions<TRequest>) {
    super(options);
    this.isRequest = options.isRequest;
  }

  protected toInput(input: unknown): FinalizeInput<TRequest> {
    return { request: narrow(this.id, "request", input, this.isRequest) };
  }

  protected forward(input: FinalizeInput<TRequest>): unknown {
    return input.request;
  }

  protected toOutput(result: unknown): FinalizeOutput {
    return { result };
  }

  protected fromOutput(output: FinalizeOutput): unknown {
    return output.result;
  }
}

import { middlewareFunc, type Handler, type Middleware, type MiddlewareFunc } from "./handler.js";
import { Step, narrow, type StepOptions, type TypeGuard } from "./step.js";

/**
 * Input for InitializeMiddleware. Middleware may validate or replace the
 * operation parameters before they are serialized.
 */
export interface InitializeInput<TParams = unknown> {
  parameters: TParams;
}

export interface InitializeOutput {
  result: unknown;
}

export type InitializeHandler<TParams = unknown> = Handler<InitializeInput<TParams>, InitializeOutput>;

export type InitializeMiddleware<TParams = unknown> = Middleware<
  InitializeInput<TParams>,
  InitializeOutput
>;

export function initializeMiddlewareFunc<TParams = unknown>(
  id: string,
  fn: MiddlewareFunc<InitializeInput<TParams>, InitializeOutput>,
): InitializeMiddleware<TParams> {
  return middlewareFunc(id, fn);
}

export interface InitializeStepOptions<TParams> extends StepOptions {
  isParameters: TypeGuard<TParams>;
}

/** First step of a stack; sees the caller's parameters as given. */
export class InitializeStep<TParams = unknown> extends Step<InitializeInput<TParams>, InitializeOutput> {
  readonly id = "Initialize stack step";
  private readonly isParameters: TypeGuard<TParams>;

  constructor(options: InitializeStepOptions<TParams>) {
    super(options);
    this.isParameters = options.isParameters;
  }

  protected toInput(input: unknown): InitializeInput<TParams> {
    return { parameters: narrow(this.id, "parameters", input, this.isParameters) };
  }

  protected forward(input: InitializeInput<TParams>): unknown {
    return input.parameters;
  }

  protected toOutput(result: unknown): InitializeOutput {
    return { result };
  }

  protected fromOutput(output: InitializeOutput): unknown {
    return output.result;
  }
}

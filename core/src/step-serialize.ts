import { middlewareFunc, type Handler, type Middleware, type MiddlewareFunc } from "./handler.js";
import { Step, narrow, type StepOptions, type TypeGuard } from "./step.js";

/**
 * Input for SerializeMiddleware. Middleware write the parameters into the
 * request; the request is what the next step receives.
 */
export interface SerializeInput<TParams = unknown, TRequest = unknown> {
  parameters: TParams;
  request: TRequest;
}

export interface SerializeOutput {
  result: unknown;
}

export type SerializeHandler<TParams = unknown, TRequest = unknown> = Handler<
  SerializeInput<TParams, TRequest>,
  SerializeOutput
>;

export type SerializeMiddleware<TParams = unknown, TRequest = unknown> = Middleware<
  SerializeInput<TParams, TRequest>,
  SerializeOutput
>;

export function serializeMiddlewareFunc<TParams = unknown, TRequest = unknown>(
  id: string,
  fn: MiddlewareFunc<SerializeInput<TParams, TRequest>, SerializeOutput>,
): SerializeMiddleware<TParams, TRequest> {
  return middlewareFunc(id, fn);
}

export interface SerializeStepOptions<TParams, TRequest> extends StepOptions {
  isParameters: TypeGuard<TParams>;
  /** Creates the empty request the serializers fill in. Called once per invocation. */
  newRequest: () => TRequest;
}

/**
 * Turns parameters into a transport request. The step hands the request,
 * not the parameters, to the next handler.
 */
export class SerializeStep<TParams = unknown, TRequest = unknown> extends Step<
  SerializeInput<TParams, TRequest>,
  SerializeOutput
> {
  readonly id = "Serialize stack step";
  private readonly isParameters: TypeGuard<TParams>;
  private readonly newRequest: () => TRequest;

  constructor(options: SerializeStepOptions<TParams, TRequest>) {
    super(options);
    this.isParameters = options.isParameters;
    this.newRequest = options.newRequest;
  }

  protected toInput(input: unknown): SerializeInput<TParams, TRequest> {
    return {
      parameters: narrow(this.id, "parameters", input, this.isParameters),
      request: this.newRequest(),
    };
  }

  protected forward(input: SerializeInput<TParams, TRequest>): unknown {
    return input.request;
  }

  protected toOutput(result: unknown): SerializeOutput {
    return { result };
  }

  protected fromOutput(output: SerializeOutput): unknown {
    return output.result;
  }
}

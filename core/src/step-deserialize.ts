import { middlewareFunc, type Handler, type Middleware, type MiddlewareFunc } from "./handler.js";
import { Step, narrow, type StepOptions, type TypeGuard } from "./step.js";

export interface DeserializeInput<TRequest = unknown> {
  request: TRequest;
}

/**
 * Output of the deserialize chain. The terminal sets `rawResponse` to what
 * the outer handler returned and leaves `result` undefined; deserializers
 * decode the raw response into `result` on the way back.
 */
export interface DeserializeOutput {
  rawResponse: unknown;
  result: unknown;
}

export type DeserializeHandler<TRequest = unknown> = Handler<DeserializeInput<TRequest>, DeserializeOutput>;

export type DeserializeMiddleware<TRequest = unknown> = Middleware<
  DeserializeInput<TRequest>,
  DeserializeOutput
>;

export function deserializeMiddlewareFunc<TRequest = unknown>(
  id: string,
  fn: MiddlewareFunc<DeserializeInput<TRequest>, DeserializeOutput>,
): DeserializeMiddleware<TRequest> {
  return middlewareFunc(id, fn);
}

export interface DeserializeStepOptions<TRequest> extends StepOptions {
  isRequest: TypeGuard<TRequest>;
}

/** Last step of a stack; the only one whose terminal sees the raw reply. */
export class DeserializeStep<TRequest = unknown> extends Step<DeserializeInput<TRequest>, DeserializeOutput> {
  readonly id = "Deserialize stack step";
  private readonly isRequest: TypeGuard<TRequest>;

  constructor(options: DeserializeStepOptions<TRequest>) {
    super(options);
    this.isRequest = options.isRequest;
  }

  protected toInput(input: unknown): DeserializeInput<TRequest> {
    return { request: narrow(this.id, "request", input, this.isRequest) };
  }

  protected forward(input: DeserializeInput<TRequest>): unknown {
    return input.request;
  }

  protected toOutput(result: unknown): DeserializeOutput {
    return { rawResponse: result, result: undefined };
  }

  protected fromOutput(output: DeserializeOutput): unknown {
    return output.result;
  }
}

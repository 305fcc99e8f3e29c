import type { BuildMiddleware } from "@opstack/core";
import type { NatsRequest } from "../request.js";

/** Static headers (build step). Later values replace earlier ones. */
export function createHeadersMiddleware(
  id: string,
  values: Record<string, string>,
): BuildMiddleware<NatsRequest> {
  return {
    id,
    handleMiddleware(ctx, input, next) {
      for (const [key, value] of Object.entries(values)) {
        input.request.headers.set(key, value);
      }
      return next.handle(ctx, input);
    },
  };
}
